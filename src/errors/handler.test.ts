import { AxiosError, AxiosHeaders } from 'axios';
import { isErrnoException, mapHttpError, mapSystemError, toAppError } from './handler';
import { AppError, ErrorCode } from './types';

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, undefined, {
    status,
    statusText: '',
    headers,
    config,
    data: '',
  });
}

function errno(code: string, path?: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: failure`);
  error.code = code;
  error.path = path;
  return error;
}

describe('mapHttpError', () => {
  it('maps a refused connection', () => {
    const error = mapHttpError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
    expect(error.code).toBe(ErrorCode.CONNECTION_REFUSED);
    expect(error.isRecoverable).toBe(true);
  });

  it('maps an aborted request to a timeout', () => {
    expect(mapHttpError(new AxiosError('timeout', 'ECONNABORTED')).code).toBe(ErrorCode.TIMEOUT);
  });

  it('maps 429 with its retry-after header', () => {
    const error = mapHttpError(httpError(429, { 'retry-after': '30' }));
    expect(error.code).toBe(ErrorCode.RATE_LIMITED);
    expect(error.details).toEqual({ statusCode: 429, retryAfter: '30' });
  });

  it('maps server errors as recoverable API errors', () => {
    const error = mapHttpError(httpError(503));
    expect(error.code).toBe(ErrorCode.API_ERROR);
    expect(error.isRecoverable).toBe(true);
  });

  it('maps client errors as permanent API errors', () => {
    const error = mapHttpError(httpError(404));
    expect(error.code).toBe(ErrorCode.API_ERROR);
    expect(error.isRecoverable).toBe(false);
    expect(error.details).toEqual({ statusCode: 404 });
  });
});

describe('isErrnoException', () => {
  it('accepts errno-shaped objects that are not Error instances', () => {
    expect(isErrnoException({ code: 'ENOENT', message: 'missing' })).toBe(true);
    expect(isErrnoException({ code: 'Z_DATA_ERROR', errno: -3 })).toBe(true);
  });

  it('rejects values without a string code', () => {
    expect(isErrnoException({ code: 2 })).toBe(false);
    expect(isErrnoException(new Error('boom'))).toBe(false);
    expect(isErrnoException(null)).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});

describe('mapSystemError', () => {
  it('maps ENOENT to FILE_NOT_FOUND with the path', () => {
    const error = mapSystemError(errno('ENOENT', '/videos/movie.mkv'));
    expect(error.code).toBe(ErrorCode.FILE_NOT_FOUND);
    expect(error.toUserMessage()).toBe('File not found: /videos/movie.mkv');
  });

  it('maps EACCES to PERMISSION_DENIED', () => {
    expect(mapSystemError(errno('EACCES')).code).toBe(ErrorCode.PERMISSION_DENIED);
  });

  it('maps ENOSPC to DISK_FULL', () => {
    expect(mapSystemError(errno('ENOSPC')).code).toBe(ErrorCode.DISK_FULL);
  });

  it('maps anything else to IO_ERROR', () => {
    const error = mapSystemError(errno('EISDIR', '/videos'));
    expect(error.code).toBe(ErrorCode.IO_ERROR);
    expect(error.details).toMatchObject({ originalCode: 'EISDIR', path: '/videos' });
  });
});

describe('toAppError', () => {
  it('returns an AppError unchanged', () => {
    const original = new AppError('No results', ErrorCode.NO_RESULTS);
    expect(toAppError(original)).toBe(original);
  });

  it('converts axios errors', () => {
    expect(toAppError(httpError(500)).code).toBe(ErrorCode.API_ERROR);
  });

  it('converts errno errors', () => {
    expect(toAppError(errno('ENOENT')).code).toBe(ErrorCode.FILE_NOT_FOUND);
  });

  it('converts errno errors raised outside this module context', () => {
    const foreign = { code: 'ENOENT', message: 'no such file', path: '/videos/movie.mkv' };
    const error = toAppError(foreign);
    expect(error.code).toBe(ErrorCode.FILE_NOT_FOUND);
    expect(error.details).toEqual({ path: '/videos/movie.mkv', syscall: undefined });
  });

  it('wraps plain errors and other values', () => {
    expect(toAppError(new Error('boom'))).toMatchObject({
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'boom',
    });
    expect(toAppError('text').message).toBe('text');
  });
});
