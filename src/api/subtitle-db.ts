import { ServiceConfig } from '../config';
import { AppError, ErrorCode } from '../errors/types';
import {
  SearchCandidate,
  SearchTerm,
  SubtitleLanguage,
  SubtitleService,
} from '../types/subtitles';
import { logger } from '../utils/logger';
import {
  parseDownloadPayload,
  parseLanguages,
  parseLoginResult,
  parseSearchResults,
} from './results';
import { createHttpTransport, RpcCaller, XmlRpcClient } from './xmlrpc';

export interface LoginCredentials {
  username: string;
  password: string;
  language: string;
  userAgent: string;
}

/**
 * Client for the subtitle database's XML-RPC API
 */
export class SubtitleDbClient implements SubtitleService {
  constructor(private rpc: RpcCaller) {}

  static fromConfig(config: ServiceConfig): SubtitleDbClient {
    const transport = createHttpTransport(config.endpoint, { userAgent: config.userAgent });
    return new SubtitleDbClient(new XmlRpcClient(transport));
  }

  /**
   * Open a session and return its token
   */
  async logIn(credentials: LoginCredentials): Promise<string> {
    const result = parseLoginResult(
      await this.rpc.call('LogIn', [
        credentials.username,
        credentials.password,
        credentials.language,
        credentials.userAgent,
      ])
    );

    if (result.status !== '200 OK') {
      throw new AppError(result.status, ErrorCode.AUTH_FAILED, { status: result.status }, false);
    }
    if (!result.token) {
      throw new AppError('No session token in login response', ErrorCode.AUTH_FAILED, {}, false);
    }

    logger.debug('Logged in to the subtitle database');
    return result.token;
  }

  async searchSubtitles(
    token: string,
    terms: SearchTerm[],
    limit: number
  ): Promise<SearchCandidate[]> {
    const value = await this.rpc.call('SearchSubtitles', [token, terms, { limit }]);
    return parseSearchResults(value);
  }

  /**
   * Fetch one subtitle; resolves with the base64 text of its gzipped content
   */
  async downloadSubtitle(token: string, subtitleId: number): Promise<string> {
    const value = await this.rpc.call('DownloadSubtitles', [token, [subtitleId]]);
    return parseDownloadPayload(value);
  }

  async listLanguages(): Promise<SubtitleLanguage[]> {
    return parseLanguages(await this.rpc.call('GetSubLanguages'));
  }
}
