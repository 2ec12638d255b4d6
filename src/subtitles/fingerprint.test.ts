import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { fingerprintFile, formatFingerprintHash } from './fingerprint';
import { AppError, ErrorCode } from '../errors/types';

/**
 * Straightforward restatement of the hash for comparison
 */
function referenceHash(data: Buffer): bigint {
  const window = 65536;
  const sumWindow = (start: number): bigint => {
    let sum = 0n;
    const end = Math.min(start + window, data.length);
    for (let offset = start; offset + 8 <= end; offset += 8) {
      sum += data.readBigUInt64LE(offset);
    }
    return sum;
  };
  const total = BigInt(data.length) + sumWindow(0) + sumWindow(Math.max(data.length - window, 0));
  return total % 2n ** 64n;
}

function patternedBuffer(length: number, seed: number): Buffer {
  const buffer = Buffer.alloc(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    buffer[i] = state & 0xff;
  }
  return buffer;
}

describe('fingerprintFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'subfetch-fingerprint-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  async function writeSample(name: string, data: Buffer): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fs.writeFile(filePath, data);
    return filePath;
  }

  it('counts the single word of an 8-byte file twice', async () => {
    const filePath = await writeSample('tiny.bin', Buffer.alloc(8, 0x01));

    const result = await fingerprintFile(filePath);

    // 8 + 2 * 0x0101010101010101
    expect(result).toEqual({ hash: 0x020202020202020an, size: 8 });
    expect(formatFingerprintHash(result.hash)).toBe('020202020202020a');
  });

  it('wraps around at 64 bits', async () => {
    const filePath = await writeSample('max.bin', Buffer.alloc(8, 0xff));

    const result = await fingerprintFile(filePath);

    // 8 + 2 * (2^64 - 1) mod 2^64
    expect(result.hash).toBe(6n);
  });

  it('ignores a partial trailing word', async () => {
    const data = Buffer.concat([Buffer.alloc(8, 0x01), Buffer.from([0xff, 0xff, 0xff])]);
    const filePath = await writeSample('partial.bin', data);

    const result = await fingerprintFile(filePath);

    expect(result).toEqual({ hash: 11n + 2n * 0x0101010101010101n, size: 11 });
  });

  it('equals size plus twice the word sum for files under 64 KiB', async () => {
    const data = patternedBuffer(40000, 7);
    const filePath = await writeSample('small.bin', data);

    let words = 0n;
    for (let offset = 0; offset + 8 <= data.length; offset += 8) {
      words += data.readBigUInt64LE(offset);
    }

    const result = await fingerprintFile(filePath);

    expect(result.hash).toBe((40000n + 2n * words) % 2n ** 64n);
  });

  it('hashes the leading and trailing windows of a large file', async () => {
    const data = patternedBuffer(300000, 42);
    const filePath = await writeSample('large.bin', data);

    const result = await fingerprintFile(filePath);

    expect(result.size).toBe(300000);
    expect(result.hash).toBe(referenceHash(data));
  });

  it('does not depend on the file name', async () => {
    const data = patternedBuffer(200000, 3);
    const first = await fingerprintFile(await writeSample('Movie.2014.mkv', data));
    const second = await fingerprintFile(await writeSample('renamed.avi', data));

    expect(second).toEqual(first);
  });

  it('hashes an empty file to zero', async () => {
    const filePath = await writeSample('empty.bin', Buffer.alloc(0));

    await expect(fingerprintFile(filePath)).resolves.toEqual({ hash: 0n, size: 0 });
  });

  it('fails with FILE_NOT_FOUND for a missing file', async () => {
    const missing = path.join(tmpDir, 'missing.mkv');

    await expect(fingerprintFile(missing)).rejects.toBeInstanceOf(AppError);
    await expect(fingerprintFile(missing)).rejects.toMatchObject({
      code: ErrorCode.FILE_NOT_FOUND,
    });
  });
});

describe('formatFingerprintHash', () => {
  it('pads to 16 lowercase hex digits', () => {
    expect(formatFingerprintHash(0xabcn)).toBe('0000000000000abc');
    expect(formatFingerprintHash(2n ** 64n - 1n)).toBe('ffffffffffffffff');
  });
});
