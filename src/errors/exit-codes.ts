import { ErrorCode } from './types';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  AUTH: 3,
  NO_RESULTS: 4,
  UPSTREAM: 5,
  ALREADY_EXISTS: 6,
  CANCELLED: 7,
  IO: 8,
  DECODE: 9,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(code: ErrorCode): ExitCode {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
      return EXIT_CODES.USAGE;

    case ErrorCode.AUTH_FAILED:
      return EXIT_CODES.AUTH;

    case ErrorCode.NO_RESULTS:
      return EXIT_CODES.NO_RESULTS;

    case ErrorCode.NETWORK_ERROR:
    case ErrorCode.TIMEOUT:
    case ErrorCode.CONNECTION_REFUSED:
    case ErrorCode.API_ERROR:
    case ErrorCode.RATE_LIMITED:
    case ErrorCode.RPC_FAULT:
    case ErrorCode.RESULT_PARSE_ERROR:
      return EXIT_CODES.UPSTREAM;

    case ErrorCode.ALREADY_EXISTS:
      return EXIT_CODES.ALREADY_EXISTS;

    case ErrorCode.OPERATION_CANCELLED:
      return EXIT_CODES.CANCELLED;

    case ErrorCode.FILE_NOT_FOUND:
    case ErrorCode.PERMISSION_DENIED:
    case ErrorCode.DISK_FULL:
    case ErrorCode.IO_ERROR:
      return EXIT_CODES.IO;

    case ErrorCode.DECODE_FAILED:
    case ErrorCode.DECOMPRESSION_FAILED:
      return EXIT_CODES.DECODE;

    default:
      return EXIT_CODES.FAILURE;
  }
}
