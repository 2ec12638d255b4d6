import * as fs from 'fs/promises';
import { isErrnoException, mapSystemError } from '../errors/handler';
import { FileFingerprint } from '../types/subtitles';

export const FINGERPRINT_WINDOW = 65536;
const WORD_SIZE = 8;

/**
 * Add the complete little-endian 64-bit words of `buffer` to `hash`,
 * wrapping at 2^64. A partial trailing word is not summed.
 */
function sumWords(hash: bigint, buffer: Buffer, length: number): bigint {
  let sum = hash;
  const words = Math.floor(length / WORD_SIZE);
  for (let i = 0; i < words; i++) {
    sum = BigInt.asUintN(64, sum + buffer.readBigUInt64LE(i * WORD_SIZE));
  }
  return sum;
}

/**
 * Compute the OpenSubtitles-style hash of a file: its size plus the 64-bit
 * word sums of the first and last 64 KiB. Files under 64 KiB read the same
 * window twice.
 */
export async function fingerprintFile(filePath: string): Promise<FileFingerprint> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    const { size } = await handle.stat();
    const buffer = Buffer.alloc(FINGERPRINT_WINDOW);

    let hash = BigInt.asUintN(64, BigInt(size));

    const head = await handle.read(buffer, 0, FINGERPRINT_WINDOW, 0);
    hash = sumWords(hash, buffer, head.bytesRead);

    const tail = await handle.read(buffer, 0, FINGERPRINT_WINDOW, Math.max(size - FINGERPRINT_WINDOW, 0));
    hash = sumWords(hash, buffer, tail.bytesRead);

    return { hash, size };
  } catch (error) {
    throw isErrnoException(error) ? mapSystemError(error) : error;
  } finally {
    await handle?.close();
  }
}

/**
 * 16 lowercase hex digits, zero padded
 */
export function formatFingerprintHash(hash: bigint): string {
  return hash.toString(16).padStart(16, '0');
}
