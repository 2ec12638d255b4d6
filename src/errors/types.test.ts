import {
  AppError,
  CompressionError,
  DecodeError,
  ErrorCode,
  ResultParseError,
  RpcError,
} from './types';
import { exitCodeFor, EXIT_CODES } from './exit-codes';

describe('AppError', () => {
  it('sets fields correctly via constructor', () => {
    const err = new AppError('test message', ErrorCode.NO_RESULTS, { fileName: 'movie.mkv' }, true);
    expect(err.message).toBe('test message');
    expect(err.code).toBe(ErrorCode.NO_RESULTS);
    expect(err.details).toEqual({ fileName: 'movie.mkv' });
    expect(err.isRecoverable).toBe(true);
    expect(err.name).toBe('AppError');
  });

  it('is an instance of Error', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err).toBeInstanceOf(Error);
  });

  it('defaults isRecoverable to false', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err.isRecoverable).toBe(false);
  });
});

describe('toUserMessage', () => {
  it('returns non-empty string for all ErrorCode values', () => {
    for (const code of Object.values(ErrorCode)) {
      const err = new AppError('fallback', code);
      const msg = err.toUserMessage();
      expect(typeof msg).toBe('string');
      expect(msg.length).toBeGreaterThan(0);
    }
  });

  it('names the file for NO_RESULTS', () => {
    const err = new AppError('x', ErrorCode.NO_RESULTS, { fileName: 'movie.mkv' });
    expect(err.toUserMessage()).toBe('No results for movie.mkv.');
  });

  it('names the path for ALREADY_EXISTS', () => {
    const err = new AppError('x', ErrorCode.ALREADY_EXISTS, { path: '/a/b/movie.srt' });
    expect(err.toUserMessage()).toBe('File already exists, aborting: /a/b/movie.srt');
  });

  it('returns original message for VALIDATION_ERROR', () => {
    const err = new AppError('custom validation msg', ErrorCode.VALIDATION_ERROR);
    expect(err.toUserMessage()).toBe('custom validation msg');
  });
});

describe('getRecoverySuggestion', () => {
  it('points at the force flag for ALREADY_EXISTS', () => {
    const err = new AppError('x', ErrorCode.ALREADY_EXISTS);
    expect(err.getRecoverySuggestion()).toBe('Use -f to force an overwrite');
  });

  it('returns null for OPERATION_CANCELLED', () => {
    const err = new AppError('x', ErrorCode.OPERATION_CANCELLED);
    expect(err.getRecoverySuggestion()).toBeNull();
  });
});

describe('subclasses', () => {
  it('RpcError carries the fault code', () => {
    const err = new RpcError(401, 'Unauthorized');
    expect(err).toBeInstanceOf(AppError);
    expect(err.code).toBe(ErrorCode.RPC_FAULT);
    expect(err.faultCode).toBe(401);
    expect(err.toUserMessage()).toBe('Query failed: Unauthorized (401)');
  });

  it('ResultParseError carries the field name', () => {
    const err = new ResultParseError('SubFileName', 'missing');
    expect(err.field).toBe('SubFileName');
    expect(err.details).toEqual({ field: 'SubFileName' });
  });

  it('CompressionError carries the zlib code', () => {
    const err = new CompressionError('Z_DATA_ERROR', 'incorrect header check');
    expect(err.code).toBe(ErrorCode.DECOMPRESSION_FAILED);
    expect(err.zlibCode).toBe('Z_DATA_ERROR');
  });

  it('DecodeError uses DECODE_FAILED', () => {
    const err = new DecodeError("Invalid character '$'");
    expect(err.name).toBe('DecodeError');
    expect(err.code).toBe(ErrorCode.DECODE_FAILED);
    expect(err.toUserMessage()).toBe("Subtitle payload is not valid base64: Invalid character '$'");
  });
});

describe('exitCodeFor', () => {
  it('maps retrieval errors to distinct exit codes', () => {
    expect(exitCodeFor(ErrorCode.NO_RESULTS)).toBe(EXIT_CODES.NO_RESULTS);
    expect(exitCodeFor(ErrorCode.ALREADY_EXISTS)).toBe(EXIT_CODES.ALREADY_EXISTS);
    expect(exitCodeFor(ErrorCode.OPERATION_CANCELLED)).toBe(EXIT_CODES.CANCELLED);
    expect(exitCodeFor(ErrorCode.RPC_FAULT)).toBe(EXIT_CODES.UPSTREAM);
    expect(exitCodeFor(ErrorCode.DECOMPRESSION_FAILED)).toBe(EXIT_CODES.DECODE);
    expect(exitCodeFor(ErrorCode.FILE_NOT_FOUND)).toBe(EXIT_CODES.IO);
  });

  it('falls back to a generic failure', () => {
    expect(exitCodeFor(ErrorCode.UNKNOWN_ERROR)).toBe(EXIT_CODES.FAILURE);
  });
});
