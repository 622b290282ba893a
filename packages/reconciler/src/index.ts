export { type Clock, ManualClock, systemClock } from './Clock';
export {
  ApiError,
  ConfigurationError,
  InvalidResourceIdError,
  isNotFound,
  type ReconcilePhase,
  RequestError,
  ResourceExistsError,
  StratoformError,
  TimeoutError,
  ValidationError,
} from './errors';
export type { ILongRunningOperation, IResourceApi, IResourceIdentity, OperationStatus } from './IResourceApi';
export { DEFAULT_POLL_INTERVAL_MS, type DeleteConfirmation, LifecycleReconciler, type ReconcilerOptions } from './LifecycleReconciler';
export { createLogger, DEFAULT_LOGGER_CONFIG, getComponentLogger, getLoggerConfigFromEnv, type LogLevel, type Logger, type LoggerConfig, logger } from './logger';
export { failed, type Failed, type FetchOutcome, type Observation, type Outcome, succeeded, type Succeeded, timedOut, type TimedOut, unwrap } from './Outcome';
