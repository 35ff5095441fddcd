/**
 * Error hierarchy for the scene-list generator
 *
 * Provides:
 * - Machine-readable error codes
 * - Context metadata for structured logging
 * - A split between operational failures (a pass can be retried on the
 *   next interval) and permanent ones (configuration, missing binaries)
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Configuration Errors (permanent)
  CONFIG_MISSING = 'CONFIG_MISSING',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // File System Errors (operational)
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',
  FS_TARGET_IS_DIRECTORY = 'FS_TARGET_IS_DIRECTORY',

  // System Errors (permanent)
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'probe', 'writeManifest') */
  operation?: string;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether retrying the same work later can succeed
   */
  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================
// OPERATIONAL ERRORS (retryable on next pass)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (not retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext,
    code: ErrorCode = ErrorCode.CONFIG_INVALID
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      code,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

// ============================================
// SYSTEM ERRORS
// ============================================

export class SystemError extends PermanentError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, context, cause);
  }
}

export class ProcessError extends SystemError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number | string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Process '${processName}' failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}
