import {
  FileFingerprint,
  SearchCandidate,
  SearchTerm,
  SelectionPolicy,
  SubtitleService,
} from '../types/subtitles';
import { logger } from '../utils/logger';
import { formatFingerprintHash } from './fingerprint';

export interface SearchRequest {
  /** Bare file name, without directories */
  fileName: string;
  fingerprint?: FileFingerprint;
  policy: Pick<SelectionPolicy, 'hashOnly' | 'nameOnly' | 'language' | 'limit'>;
}

/**
 * Build the fingerprint and name terms for one search. A fingerprint term
 * needs a fingerprint; `nameOnly` and `hashOnly` each suppress one term.
 */
export function buildSearchTerms(request: SearchRequest): SearchTerm[] {
  const { fileName, fingerprint, policy } = request;
  const terms: SearchTerm[] = [];

  if (!policy.nameOnly && fingerprint) {
    terms.push({
      sublanguageid: policy.language,
      moviehash: formatFingerprintHash(fingerprint.hash),
      moviebytesize: String(fingerprint.size),
    });
  }

  if (!policy.hashOnly) {
    terms.push({ sublanguageid: policy.language, query: fileName });
  }

  return terms;
}

/**
 * Issue one batched search and return its candidates in service order
 */
export async function searchCandidates(
  service: SubtitleService,
  token: string,
  request: SearchRequest
): Promise<SearchCandidate[]> {
  const terms = buildSearchTerms(request);
  logger.debug(`Searching with ${terms.length} term(s) for ${request.fileName}`);
  return service.searchSubtitles(token, terms, request.policy.limit);
}
