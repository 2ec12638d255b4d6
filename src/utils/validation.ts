import { AppError, ErrorCode } from '../errors/types';

const LANGUAGE_CODE = /^[a-z]{3}$/;

/**
 * Parse the --limit option: a positive decimal integer
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();
  const limit = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new AppError(
      `Invalid limit: ${value}`,
      ErrorCode.VALIDATION_ERROR,
      { limit: value },
      false
    );
  }
  return limit;
}

/**
 * Normalize the --lang option to the service's form: `all`, or
 * comma-separated three-letter codes such as `eng,ger`
 */
export function normalizeLanguageFilter(value: string): string {
  const codes = value
    .split(',')
    .map((code) => code.trim().toLowerCase())
    .filter((code) => code.length > 0);

  if (codes.length === 1 && codes[0] === 'all') {
    return 'all';
  }

  const invalid = codes.filter((code) => !LANGUAGE_CODE.test(code));
  if (codes.length === 0 || invalid.length > 0) {
    throw new AppError(
      `Invalid language filter: ${value}`,
      ErrorCode.VALIDATION_ERROR,
      { lang: value, invalid },
      false
    );
  }

  return codes.join(',');
}
