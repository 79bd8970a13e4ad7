// Result type
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  tryCatch,
  tryCatchAsync,
  toError,
} from './result.js';

// Logger
export {
  type Logger,
  type LogLevel,
  type LogContext,
  logger,
  createLogger,
  createChildLogger,
  setLogLevel,
  withTiming,
} from './logger.js';

// Concurrency
export { type Release, AdmissionGate } from './gate.js';
