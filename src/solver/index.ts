export { feedbackPattern, feedbackTrits, FeedbackScorer } from './feedback'
export {
  ABSENT,
  PRESENT,
  EXACT,
  encodeTrits,
  decodePattern,
  isNumericLength,
  isSolved,
  MAX_NUMERIC_TRITS,
  type Trit,
  type FeedbackPattern,
  type PatternValue,
} from './pattern'
export {
  createKnowledge,
  updateKnowledge,
  knowledgeFromHistory,
  confirmedLetters,
  type KnowledgeState,
  type GuessEntry,
} from './knowledge'
export { filterCandidates, filterByPattern } from './filter'
export { pickByFrequency, rankByFrequency, letterCoverage } from './frequency'
export {
  scanMinimax,
  rankMinimax,
  evaluateGuess,
  minimaxPool,
  preferEvaluation,
  compareEvaluations,
  FINISH_THRESHOLD,
  type MinimaxEvaluation,
} from './minimax'
export {
  createStrategy,
  selectGuess,
  isStrategyId,
  FrequencyStrategy,
  MinimaxStrategy,
  STRATEGY_IDS,
  type GuessStrategy,
  type StrategyId,
} from './strategy'
export {
  hardModeViolations,
  isHardModeValid,
  describeViolation,
  type HardModeViolation,
} from './hardMode'
export { LengthMismatchError } from './errors'
