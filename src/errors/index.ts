/**
 * Error System Export
 *
 * All application errors should be imported from this file.
 */

export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Operational errors (a later pass may succeed)
export {
  OperationalError,
  FileSystemError,
} from './ApplicationError.js';

// Permanent errors (not retryable)
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';

// System errors
export {
  SystemError,
  ProcessError,
} from './ApplicationError.js';
