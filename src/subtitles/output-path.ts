import * as path from 'path';
import { ResultParseError } from '../errors/types';
import { logger } from '../utils/logger';

export const DEFAULT_SUBTITLE_EXTENSION = '.srt';

/**
 * Base name of a service-reported file name. Either separator counts, so a
 * name can never point outside the video's directory.
 */
export function subtitleBaseName(subtitleFileName: string): string {
  const base = path.posix.basename(subtitleFileName.replace(/\\/g, '/'));
  if (base === '' || base === '.' || base === '..') {
    throw new ResultParseError('SubFileName', `Unusable subtitle file name: ${subtitleFileName}`);
  }
  return base;
}

/**
 * Where a subtitle for `videoPath` is written.
 *
 * With `sameName` the video's extension is swapped for the subtitle's
 * (appended when the video has none); otherwise the subtitle keeps its own
 * name beside the video.
 */
export function deriveOutputPath(
  videoPath: string,
  subtitleFileName: string,
  sameName: boolean
): string {
  const subtitleName = subtitleBaseName(subtitleFileName);

  if (!sameName) {
    return path.join(path.dirname(videoPath), subtitleName);
  }

  let extension = path.extname(subtitleName);
  if (extension === '') {
    logger.warn(`Subtitle ${subtitleName} has no extension, using ${DEFAULT_SUBTITLE_EXTENSION}`);
    extension = DEFAULT_SUBTITLE_EXTENSION;
  }

  const videoExtension = path.extname(videoPath);
  return videoPath.slice(0, videoPath.length - videoExtension.length) + extension;
}
