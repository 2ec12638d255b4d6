/**
 * Content fingerprint of a local video file, used as the exact-match search key
 */
export interface FileFingerprint {
  /** Unsigned 64-bit sum of size and the leading/trailing 64 KiB words */
  hash: bigint;
  size: number;
}

/**
 * One subtitle record returned by a search
 */
export interface SearchCandidate {
  id: number;
  /** The service matched this subtitle on the fingerprint, not on the name */
  matchedByHash: boolean;
  language: string;
  releaseName: string;
  fileName: string;
}

export interface SelectionPolicy {
  alwaysAsk: boolean;
  neverAsk: boolean;
  hashOnly: boolean;
  nameOnly: boolean;
  limit: number;
  sameName: boolean;
  forceOverwrite: boolean;
  /** Language filter: 'eng', 'eng,ger' or 'all' */
  language: string;
  /** 1 hides the table when nothing is asked, 2 hides everything but warnings */
  quiet: number;
}

export const DEFAULT_SELECTION_POLICY: SelectionPolicy = {
  alwaysAsk: false,
  neverAsk: false,
  hashOnly: false,
  nameOnly: false,
  limit: 10,
  sameName: false,
  forceOverwrite: false,
  language: 'eng',
  quiet: 0,
};

export interface SubtitleLanguage {
  id: string;
  name: string;
}

/**
 * Search term sent to SearchSubtitles. Field names are the service's.
 */
export type SearchTerm =
  | { sublanguageid: string; moviehash: string; moviebytesize: string }
  | { sublanguageid: string; query: string };

/**
 * The calls of the remote subtitle database that retrieval depends on
 */
export interface SubtitleService {
  searchSubtitles(token: string, terms: SearchTerm[], limit: number): Promise<SearchCandidate[]>;
  downloadSubtitle(token: string, subtitleId: number): Promise<string>;
}
