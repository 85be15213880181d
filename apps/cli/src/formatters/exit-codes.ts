/**
 * Exit Code Handler
 * Maps the error that aborted a command to the process exit code
 */

import { EXIT_CODES, ExitCode, SqconfError } from '../platform/errors';

const DESCRIPTIONS: Record<ExitCode, string> = {
  [EXIT_CODES.SUCCESS]: 'Success',
  [EXIT_CODES.AUTHENTICATION]: 'Authentication failed',
  [EXIT_CODES.AUTHORIZATION]: 'Insufficient permissions',
  [EXIT_CODES.API_ERROR]: 'Server API error',
  [EXIT_CODES.TOKEN_MISSING]: 'No token given',
  [EXIT_CODES.NO_SUCH_KEY]: 'Object not found',
  [EXIT_CODES.UNSUPPORTED_OPERATION]: 'Operation not supported by the server',
  [EXIT_CODES.RULES_LOADING]: 'Audit rules could not be loaded',
  [EXIT_CODES.ARGS_ERROR]: 'Invalid arguments or configuration',
  [EXIT_CODES.OS_ERROR]: 'File system or output error',
  [EXIT_CODES.REQUEST_TIMEOUT]: 'Request timed out',
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && typeof Reflect.get(error, 'code') === 'string' && typeof Reflect.get(error, 'syscall') === 'string';
}

/**
 * Exit code handler for CI integration
 */
export class ExitCodeHandler {
  /**
   * Exit code of an error that aborted a whole command
   */
  getExitCode(error: unknown): ExitCode {
    if (error instanceof SqconfError) {
      return error.exitCode;
    }
    if (isErrnoException(error)) {
      return EXIT_CODES.OS_ERROR;
    }
    // Configuration files that do not parse surface as plain errors
    if (error instanceof SyntaxError || (error instanceof Error && error.name === 'YAMLException')) {
      return EXIT_CODES.ARGS_ERROR;
    }
    return EXIT_CODES.API_ERROR;
  }

  /**
   * Get human-readable exit code description
   */
  getExitCodeDescription(exitCode: number): string {
    const known = Object.entries(DESCRIPTIONS).find(([code]) => Number(code) === exitCode);
    return known ? known[1] : 'Unknown exit code';
  }
}

