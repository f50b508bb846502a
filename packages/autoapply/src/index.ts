export * from './engine/index.js';
export * from './adapters/index.js';
export * from './config/index.js';
export * from './monitoring/index.js';
export * from './oracle/index.js';
export {
  AttemptCancelledError,
  BrowserDisconnectedError,
  OracleUnavailableError,
  ProfileValidationError,
  SessionStateError,
  errorMessage,
} from './errors.js';
export {
  ATTEMPT_EVENT_TYPES,
  createAttemptEmitter,
  type AttemptEmitter,
  type AttemptEventMap,
  type AttemptEventType,
} from './events/AttemptEventTypes.js';
export { ObstacleDetector, type DetectionSource, type ObstacleMatch } from './detection/ObstacleDetector.js';
export { CookieStore, convertCookie, cookieMatchesHost, cookieFileName, hostOf } from './sessions/CookieStore.js';
export { PatternStore, fingerprintOf, type PatternFingerprint } from './sessions/PatternStore.js';
export {
  ApplicationLog,
  logEntryOf,
  type ApplicationLogEntry,
  type ApplicationMeta,
  type ApplicationStats,
} from './sessions/ApplicationLog.js';
export { loadProfile, parseProfile, normalizeProfileInput } from './profile/profileLoader.js';
export { resolveResumeArtifact, renderResumeText, writeResumeSurrogate, type ResumeArtifact } from './profile/resumeSurrogate.js';
export {
  AttemptRunner,
  CANCELLED_MESSAGE,
  createAttemptRunner,
  screenshotPath,
  type AttemptRequest,
  type AttemptRunnerOptions,
  type DriverFactory,
} from './workers/AttemptRunner.js';
export {
  BatchRunner,
  isApplicableUrl,
  type BatchReport,
  type BatchRunnerOptions,
  type JobOutcome,
  type JobSpec,
  type RunStats,
} from './workers/BatchRunner.js';
