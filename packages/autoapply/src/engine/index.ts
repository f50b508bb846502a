export * from './types.js';
export { ElementExtractor, type ElementExtractorOptions } from './ElementExtractor.js';
export { PageClassifier, combineAnalyses, type PageClassifierOptions } from './PageClassifier.js';
export {
  ActionRecommender,
  actionKey,
  elementToAction,
  mergeActions,
  type ActionRecommenderOptions,
  type NavigationPath,
  type RecommenderMode,
} from './ActionRecommender.js';
export {
  OracleAdvisor,
  FALLBACK_ADVICE,
  buildPrompt,
  parseAdvice,
  extractJsonObject,
  type AdviceContext,
  type OracleAdvisorOptions,
  type ParseResult,
  MAX_HISTORY_TEXT,
} from './OracleAdvisor.js';
export {
  CompatibilityAssessor,
  NEUTRAL_ASSESSMENT,
  buildCompatibilityPrompt,
  parseAssessment,
  type AssessmentParseResult,
  type CompatibilityAssessment,
  type CompatibilityAssessorOptions,
  type JobPosting,
} from './CompatibilityAssessor.js';
export {
  ActionExecutor,
  CLICK_SCRIPT,
  type ActionExecutorOptions,
  type ActionOutcome,
  type ClickMethod,
  type ExecuteAllResult,
  type ExecutionContext,
} from './ActionExecutor.js';
export {
  ElementResolver,
  STRATEGIES,
  synthesizedAlternates,
  type Resolution,
  type ResolutionStrategy,
} from './ResolutionStrategies.js';
export { ObstacleHandler, type MitigationContext, type ObstacleHandlerOptions } from './ObstacleHandler.js';
export { HumanPacer, realSleep, type HumanPacerOptions, type SleepFn } from './HumanPacer.js';
export { SessionState, type RecordOptions } from './SessionState.js';
export {
  NavigationLoop,
  MAX_ITERATIONS_REASON,
  toAttemptResult,
  type LoopRunOptions,
  type NavigationLoopOptions,
  type ResultDetails,
} from './NavigationLoop.js';
export { resolveFieldValue, isSymbolicField } from './fieldValues.js';
export { generateSelector, MAX_TEXT_HINT } from './selectors.js';
