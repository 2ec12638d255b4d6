/**
 * Typed views over the subtitle database's XML-RPC responses.
 *
 * Everything the rest of the program sees has gone through one of these
 * parsers; a missing or mistyped field fails with ResultParseError.
 */

import { ResultParseError, RpcError } from '../errors/types';
import { SearchCandidate, SubtitleLanguage } from '../types/subtitles';
import { XmlRpcStruct, XmlRpcValue } from './xmlrpc';

/** MatchedBy value the service reports for a fingerprint match */
export const HASH_MATCH_MARKER = 'moviehash';

export interface LoginResult {
  status: string;
  token: string;
}

function isStruct(value: XmlRpcValue | undefined): value is XmlRpcStruct {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireStruct(value: XmlRpcValue | undefined, field: string): XmlRpcStruct {
  if (!isStruct(value)) {
    throw new ResultParseError(field, `Expected a struct for ${field}`);
  }
  return value;
}

function requireString(struct: XmlRpcStruct, field: string): string {
  const value = struct[field];
  if (typeof value !== 'string') {
    throw new ResultParseError(
      field,
      value === undefined ? `Missing field ${field}` : `Field ${field} is not a string`
    );
  }
  return value;
}

function requireInteger(struct: XmlRpcStruct, field: string): number {
  const value = struct[field];
  // IDs are sent as strings
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
    throw new ResultParseError(
      field,
      value === undefined ? `Missing field ${field}` : `Field ${field} is not an integer`
    );
  }
  return parsed;
}

/**
 * Throw RpcError when a response carries a non-200 status such as
 * "401 Unauthorized". Responses without a status are accepted.
 */
export function assertStatusOk(response: XmlRpcStruct): void {
  const status = response.status;
  if (typeof status !== 'string' || status.startsWith('200')) {
    return;
  }
  const code = Number.parseInt(status, 10);
  throw new RpcError(Number.isNaN(code) ? 0 : code, status);
}

export function parseLoginResult(value: XmlRpcValue): LoginResult {
  const response = requireStruct(value, 'LogIn response');
  const status = requireString(response, 'status');
  const token = typeof response.token === 'string' ? response.token : '';
  return { status, token };
}

/**
 * The service answers `data: false` when nothing matched
 */
function resultArray(response: XmlRpcStruct): XmlRpcValue[] {
  const data = response.data;
  if (data === undefined || data === null || data === false) {
    return [];
  }
  if (!Array.isArray(data)) {
    throw new ResultParseError('data', 'Expected an array for data');
  }
  return data;
}

export function parseSearchCandidate(value: XmlRpcValue): SearchCandidate {
  const record = requireStruct(value, 'search result');
  return {
    id: requireInteger(record, 'IDSubtitleFile'),
    matchedByHash: requireString(record, 'MatchedBy') === HASH_MATCH_MARKER,
    language: requireString(record, 'SubLanguageID'),
    releaseName: requireString(record, 'MovieReleaseName'),
    fileName: requireString(record, 'SubFileName'),
  };
}

export function parseSearchResults(value: XmlRpcValue): SearchCandidate[] {
  const response = requireStruct(value, 'SearchSubtitles response');
  assertStatusOk(response);
  return resultArray(response).map(parseSearchCandidate);
}

/**
 * Extract data[0].data, the base64 text of the gzipped subtitle
 */
export function parseDownloadPayload(value: XmlRpcValue): string {
  const response = requireStruct(value, 'DownloadSubtitles response');
  assertStatusOk(response);

  const [first] = resultArray(response);
  if (first === undefined) {
    throw new ResultParseError('data', 'DownloadSubtitles returned no subtitle');
  }
  return requireString(requireStruct(first, 'data[0]'), 'data');
}

export function parseLanguages(value: XmlRpcValue): SubtitleLanguage[] {
  const response = requireStruct(value, 'GetSubLanguages response');
  return resultArray(response).map((item) => {
    const language = requireStruct(item, 'language');
    return {
      id: requireString(language, 'SubLanguageID'),
      name: requireString(language, 'LanguageName'),
    };
  });
}
