import { Readable, Transform, TransformCallback, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import * as zlib from 'zlib';
import { isErrnoException, mapSystemError } from '../errors/handler';
import { AppError, CompressionError, DecodeError, ErrorCode } from '../errors/types';

/** Encoded characters handed to the base64 decoder at a time */
export const DEFAULT_ENCODED_CHUNK_SIZE = 64 * 1024;

/** Inflate output buffer; smaller than one chunk may expand to */
export const INFLATE_CHUNK_SIZE = 16 * 1024;

const GZIP_MAGIC = [0x1f, 0x8b];
const GZIP_DEFLATE = 8;
const FHCRC = 0x02;
const FEXTRA = 0x04;
const FNAME = 0x08;
const FCOMMENT = 0x10;
const RESERVED_FLAGS = 0xe0;

const BASE64_ALPHABET = /^[A-Za-z0-9+/]$/;
const LINE_WHITESPACE = new Set(['\r', '\n', '\t', ' ']);

export interface DecodeOptions {
  chunkSize?: number;
}

/**
 * Incremental base64 decoder. Groups of four characters may straddle chunk
 * boundaries; nothing but whitespace may follow a padded group.
 */
export class Base64Decoder extends Transform {
  private pending = '';
  private finished = false;

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      const decoded = this.consume(chunk.toString('latin1'));
      if (decoded.length > 0) {
        this.push(decoded);
      }
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new DecodeError(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    if (this.pending.length === 0) {
      callback();
      return;
    }
    if (this.pending.length === 1 || this.pending.includes('=')) {
      callback(new DecodeError(`Incomplete final group '${this.pending}'`));
      return;
    }
    // Unpadded 2 or 3 character tail
    this.push(Buffer.from(this.pending, 'base64'));
    this.pending = '';
    callback();
  }

  private consume(text: string): Buffer {
    const complete: string[] = [];
    let group = this.pending;

    for (const ch of text) {
      if (LINE_WHITESPACE.has(ch)) {
        continue;
      }
      if (this.finished) {
        throw new DecodeError('Data after padding');
      }
      if (ch === '=') {
        if (group.length < 2) {
          throw new DecodeError('Unexpected padding');
        }
      } else if (!BASE64_ALPHABET.test(ch)) {
        throw new DecodeError(`Invalid character '${ch}'`);
      } else if (group.includes('=')) {
        throw new DecodeError('Data after padding');
      }

      group += ch;
      if (group.length === 4) {
        complete.push(group);
        this.finished = group.includes('=');
        group = '';
      }
    }

    this.pending = group;
    return Buffer.from(complete.join(''), 'base64');
  }
}

/**
 * Length of the gzip member header at the start of `buffer`, or null while
 * more bytes are needed.
 */
export function gzipHeaderLength(buffer: Buffer): number | null {
  for (let i = 0; i < GZIP_MAGIC.length && i < buffer.length; i++) {
    if (buffer[i] !== GZIP_MAGIC[i]) {
      throw new CompressionError('Z_DATA_ERROR', 'incorrect header check');
    }
  }
  if (buffer.length < 10) {
    return null;
  }
  if (buffer[2] !== GZIP_DEFLATE) {
    throw new CompressionError('Z_DATA_ERROR', 'unknown compression method');
  }
  const flags = buffer[3];
  if (flags & RESERVED_FLAGS) {
    throw new CompressionError('Z_DATA_ERROR', 'unknown header flags set');
  }

  let offset = 10;
  if (flags & FEXTRA) {
    if (buffer.length < offset + 2) {
      return null;
    }
    offset += 2 + buffer.readUInt16LE(offset);
  }
  for (const flag of [FNAME, FCOMMENT]) {
    if (flags & flag) {
      const end = buffer.indexOf(0, offset);
      if (end < 0) {
        return null;
      }
      offset = end + 1;
    }
  }
  if (flags & FHCRC) {
    offset += 2;
  }
  return buffer.length >= offset ? offset : null;
}

/**
 * Strips the gzip member header and passes the raw deflate body through.
 * Whatever follows the deflate stream (trailer, padding, further members)
 * is left for the raw inflater to ignore.
 */
export class GzipHeaderStripper extends Transform {
  private header: Buffer | null = Buffer.alloc(0);

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (!this.header) {
      callback(null, chunk);
      return;
    }
    try {
      const buffered = Buffer.concat([this.header, chunk]);
      const length = gzipHeaderLength(buffered);
      if (length === null) {
        this.header = buffered;
        callback();
        return;
      }
      this.header = null;
      const body = buffered.subarray(length);
      callback(null, body.length > 0 ? body : undefined);
    } catch (error) {
      callback(error instanceof Error ? error : new DecodeError(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    if (this.header) {
      callback(new CompressionError('Z_BUF_ERROR', 'unexpected end of file'));
      return;
    }
    callback();
  }
}

function* chunksOf(text: string, size: number): Generator<string> {
  for (let offset = 0; offset < text.length; offset += size) {
    yield text.slice(offset, offset + size);
  }
}

function toDecodeFailure(error: unknown): unknown {
  if (error instanceof AppError) {
    return error;
  }
  if (isErrnoException(error) && error.code?.startsWith('Z_')) {
    return new CompressionError(error.code, error.message);
  }
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }
  return error;
}

/**
 * Decode a base64-then-gzip payload into `sink`.
 *
 * Only the first gzip member is inflated; bytes after its deflate stream are
 * discarded. The trailer checksum is not verified. The first error aborts the pipeline; bytes already written stay in the
 * sink. The sink is ended on success and destroyed on failure.
 */
export async function decodeStream(
  encoded: string,
  sink: Writable,
  options: DecodeOptions = {}
): Promise<void> {
  const chunkSize = options.chunkSize ?? DEFAULT_ENCODED_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    sink.destroy();
    throw new AppError(
      `Invalid chunk size: ${chunkSize}`,
      ErrorCode.VALIDATION_ERROR,
      { chunkSize },
      false
    );
  }

  if (encoded.trim().length === 0) {
    sink.destroy();
    throw new CompressionError('Z_BUF_ERROR', 'Empty payload');
  }

  try {
    await pipeline(
      Readable.from(chunksOf(encoded, chunkSize)),
      new Base64Decoder(),
      new GzipHeaderStripper(),
      zlib.createInflateRaw({ chunkSize: INFLATE_CHUNK_SIZE }),
      sink
    );
  } catch (error) {
    throw toDecodeFailure(error);
  }
}
