/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Authentication errors
  AUTH_FAILED = 'AUTH_FAILED',

  // Network errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',

  // API errors
  API_ERROR = 'API_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  RPC_FAULT = 'RPC_FAULT',
  RESULT_PARSE_ERROR = 'RESULT_PARSE_ERROR',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  DISK_FULL = 'DISK_FULL',
  IO_ERROR = 'IO_ERROR',

  // Retrieval errors
  NO_RESULTS = 'NO_RESULTS',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  DECODE_FAILED = 'DECODE_FAILED',
  DECOMPRESSION_FAILED = 'DECOMPRESSION_FAILED',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return `Login to the subtitle database failed: ${this.message}`;

      case ErrorCode.NETWORK_ERROR:
        return 'Network connection failed. Please check your internet connection and try again.';

      case ErrorCode.TIMEOUT:
        return 'Request timed out. The server took too long to respond.';

      case ErrorCode.CONNECTION_REFUSED:
        return 'Connection refused. The server may be down or unreachable.';

      case ErrorCode.RATE_LIMITED:
        return this.message || 'Too many requests. Please try again later.';

      case ErrorCode.RPC_FAULT:
        return `Query failed: ${this.message}`;

      case ErrorCode.RESULT_PARSE_ERROR:
        return `Unexpected response from the subtitle database: ${this.message}`;

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.DISK_FULL:
        return 'No space left on device. Please free up some space and try again.';

      case ErrorCode.NO_RESULTS:
        return `No results for ${this.details?.fileName ?? 'this file'}.`;

      case ErrorCode.ALREADY_EXISTS:
        return `File already exists, aborting: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.DECODE_FAILED:
        return `Subtitle payload is not valid base64: ${this.message}`;

      case ErrorCode.DECOMPRESSION_FAILED:
        return `Subtitle payload could not be decompressed: ${this.message}`;

      case ErrorCode.OPERATION_CANCELLED:
        return 'Operation cancelled by user.';

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return 'Check SUBFETCH_USERNAME, SUBFETCH_PASSWORD and SUBFETCH_USER_AGENT';

      case ErrorCode.NETWORK_ERROR:
      case ErrorCode.TIMEOUT:
      case ErrorCode.CONNECTION_REFUSED:
        return 'Check your internet connection and try again';

      case ErrorCode.RATE_LIMITED:
        return 'Wait a few moments before trying again';

      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the file path is correct';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or try running with appropriate privileges';

      case ErrorCode.DISK_FULL:
        return 'Free up disk space on your local machine';

      case ErrorCode.NO_RESULTS:
        return 'Try another language with --lang, or a name-based search with -O';

      case ErrorCode.ALREADY_EXISTS:
        return 'Use -f to force an overwrite';

      case ErrorCode.DECODE_FAILED:
      case ErrorCode.DECOMPRESSION_FAILED:
        return 'The partially written subtitle file was left in place; delete it before retrying';

      default:
        return null;
    }
  }
}

/**
 * Fault reported by the remote service, or a non-200 status in a response
 */
export class RpcError extends AppError {
  public readonly faultCode: number;

  constructor(faultCode: number, message: string) {
    super(message, ErrorCode.RPC_FAULT, { faultCode }, false);
    this.name = 'RpcError';
    this.faultCode = faultCode;
  }

  toUserMessage(): string {
    return `Query failed: ${this.message} (${this.faultCode})`;
  }
}

/**
 * A response value was missing a field or carried the wrong type
 */
export class ResultParseError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, ErrorCode.RESULT_PARSE_ERROR, { field }, false);
    this.name = 'ResultParseError';
    this.field = field;
  }
}

/**
 * The gzip stream inside a subtitle payload is malformed or truncated
 */
export class CompressionError extends AppError {
  public readonly zlibCode: string;

  constructor(zlibCode: string, message: string) {
    super(message, ErrorCode.DECOMPRESSION_FAILED, { zlibCode }, false);
    this.name = 'CompressionError';
    this.zlibCode = zlibCode;
  }
}

/**
 * The base64 text of a subtitle payload is malformed
 */
export class DecodeError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.DECODE_FAILED, {}, false);
    this.name = 'DecodeError';
  }
}
