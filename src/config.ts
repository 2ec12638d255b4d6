import { version as pkgVersion } from '../package.json';
import { AppError, ErrorCode } from './errors/types';

export const DEFAULT_ENDPOINT = 'https://api.opensubtitles.org/xml-rpc';
export const DEFAULT_LOGIN_LANGUAGE = 'en';

/**
 * Connection settings for the subtitle database. Anonymous login
 * (empty username and password) is what the service expects by default.
 */
export interface ServiceConfig {
  endpoint: string;
  userAgent: string;
  loginLanguage: string;
  username: string;
  password: string;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const endpoint = env.SUBFETCH_ENDPOINT?.trim() || DEFAULT_ENDPOINT;

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new AppError(
      `Invalid SUBFETCH_ENDPOINT: ${endpoint}`,
      ErrorCode.VALIDATION_ERROR,
      { endpoint },
      false
    );
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new AppError(
      `SUBFETCH_ENDPOINT must be an http(s) URL: ${endpoint}`,
      ErrorCode.VALIDATION_ERROR,
      { endpoint },
      false
    );
  }

  return {
    endpoint,
    userAgent: env.SUBFETCH_USER_AGENT?.trim() || `subfetch v${pkgVersion}`,
    loginLanguage: env.SUBFETCH_LOGIN_LANGUAGE?.trim() || DEFAULT_LOGIN_LANGUAGE,
    username: env.SUBFETCH_USERNAME ?? '',
    password: env.SUBFETCH_PASSWORD ?? '',
  };
}
