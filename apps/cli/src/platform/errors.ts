/**
 * Error taxonomy
 * Every error raised by the engine carries a stable code and the process
 * exit code it maps to when it aborts a whole command.
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  AUTHENTICATION: 1,
  AUTHORIZATION: 2,
  API_ERROR: 3,
  TOKEN_MISSING: 4,
  NO_SUCH_KEY: 5,
  UNSUPPORTED_OPERATION: 7,
  RULES_LOADING: 8,
  ARGS_ERROR: 10,
  OS_ERROR: 11,
  REQUEST_TIMEOUT: 12,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base error class for all sqconf errors
 */
export class SqconfError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: ExitCode = EXIT_CODES.API_ERROR,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SqconfError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/**
 * Remote object vanished or never existed
 */
export class ObjectNotFoundError extends SqconfError {
  constructor(public readonly key: string, message: string) {
    super(message, 'OBJECT_NOT_FOUND', EXIT_CODES.NO_SUCH_KEY);
    this.name = 'ObjectNotFoundError';
  }
}

export class ObjectAlreadyExistsError extends SqconfError {
  constructor(public readonly key: string, message: string) {
    super(message, 'OBJECT_ALREADY_EXISTS', EXIT_CODES.API_ERROR);
    this.name = 'ObjectAlreadyExistsError';
  }
}

/**
 * Operation not available on this edition or version
 */
export class UnsupportedOperationError extends SqconfError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_OPERATION', EXIT_CODES.UNSUPPORTED_OPERATION);
    this.name = 'UnsupportedOperationError';
  }
}

export class AuthenticationError extends SqconfError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION', EXIT_CODES.AUTHENTICATION);
    this.name = 'AuthenticationError';
  }
}

export class PermissionDeniedError extends SqconfError {
  constructor(message: string) {
    super(message, 'PERMISSION_DENIED', EXIT_CODES.AUTHORIZATION);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Network level failure: connection refused, reset, aborted request
 */
export class TransportError extends SqconfError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT', EXIT_CODES.API_ERROR, options);
    this.name = 'TransportError';
  }
}

export class RateLimitedError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/**
 * Any other non successful HTTP status
 */
export class ApiError extends SqconfError {
  constructor(public readonly status: number, message: string) {
    super(message, `HTTP_${status}`, EXIT_CODES.API_ERROR);
    this.name = 'ApiError';
  }
}

export class TaskTimeoutError extends SqconfError {
  constructor(public readonly timeoutMs: number, message: string) {
    super(message, 'TIMEOUT', EXIT_CODES.REQUEST_TIMEOUT);
    this.name = 'TaskTimeoutError';
  }
}

export class TokenMissingError extends SqconfError {
  constructor(message = 'No token given: use --token, the token config key or SQCONF_TOKEN') {
    super(message, 'TOKEN_MISSING', EXIT_CODES.TOKEN_MISSING);
    this.name = 'TokenMissingError';
  }
}

export class ConfigError extends SqconfError {
  constructor(message: string) {
    super(message, 'CONFIG', EXIT_CODES.ARGS_ERROR);
    this.name = 'ConfigError';
  }
}

/**
 * Output sink could not be opened or written
 */
export class OutputError extends SqconfError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'OUTPUT', EXIT_CODES.OS_ERROR, options);
    this.name = 'OutputError';
  }
}

export class WriterStateError extends SqconfError {
  constructor(message: string) {
    super(message, 'WRITER_STATE', EXIT_CODES.OS_ERROR);
    this.name = 'WriterStateError';
  }
}

export class HierarchyCycleError extends SqconfError {
  constructor(public readonly chain: string[]) {
    super(`Hierarchy cycle detected: ${chain.join(' -> ')}`, 'HIERARCHY_CYCLE', EXIT_CODES.API_ERROR);
    this.name = 'HierarchyCycleError';
  }
}

export class RuleConfigError extends SqconfError {
  constructor(message: string) {
    super(message, 'RULE_CONFIG', EXIT_CODES.RULES_LOADING);
    this.name = 'RuleConfigError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
