/**
 * Custom Error Classes
 *
 * Expected per-slot failures (403, error bodies, timeouts) are returned as
 * `Failure` values, not thrown. These classes cover contract violations,
 * configuration problems and the transport/command layers underneath.
 */

/**
 * Base error class for all mediastage errors
 */
export class MediaStageError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaStageError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends MediaStageError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends MediaStageError {
  constructor(issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      { issues }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Connection, timeout or protocol failure talking to a media host
 */
export class TransportError extends MediaStageError {
  constructor(url: string, message: string, cause?: unknown) {
    super(
      `Request to ${url} failed: ${message}`,
      'TRANSPORT_ERROR',
      { url },
      { cause }
    );
    this.name = 'TransportError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends MediaStageError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * Work was requested after shutdown began
 */
export class ShutdownError extends MediaStageError {
  constructor() {
    super('Pipeline is shutting down', 'SHUTTING_DOWN');
    this.name = 'ShutdownError';
  }
}

/**
 * Host answered 403
 */
export class AccessDeniedError extends MediaStageError {
  constructor(url: string) {
    super(`Access denied for ${url}`, 'ACCESS_DENIED', { url });
    this.name = 'AccessDeniedError';
  }
}

/**
 * Response is not media (error page, JSON payload, empty body, bad status)
 */
export class InvalidMediaResponseError extends MediaStageError {
  constructor(url: string, reason: string) {
    super(`Invalid media response from ${url}: ${reason}`, 'INVALID_MEDIA_RESPONSE', { url, reason });
    this.name = 'InvalidMediaResponseError';
  }
}

/**
 * Transfer did not match the declared size, or went over a limit
 */
export class SizeExceededError extends MediaStageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SIZE_EXCEEDED', details);
    this.name = 'SizeExceededError';
  }
}
