/**
 * Dataverse Web API client
 *
 * Token acquisition (OAuth2 client credentials) and single authenticated
 * OData calls. Documentation: https://learn.microsoft.com/power-apps/developer/data-platform/webapi/overview
 */

import { config } from '../config';
import { ApiError, AuthError, DataverseAccessError } from '../errors';
import type { AccessToken, HttpMethod } from '../models/dataverse.model';
import { Logger, logger as rootLogger, registerSecret } from './logger.service';

const LOGIN_BASE_URL = 'https://login.microsoftonline.com';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

interface TokenResponse {
  access_token?: string;
  expires_in?: number | string;
}

interface OAuthErrorResponse {
  error?: string;
  error_description?: string;
}

/** Always https://, never a trailing slash. */
export function normalizeResourceUrl(resourceUrl: string): string {
  let url = resourceUrl.trim();
  if (!/^https?:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  url = url.replace(/^http:\/\//i, 'https://');
  return url.replace(/\/+$/, '');
}

function parseJson<T>(text: string): T | undefined {
  if (!text) return undefined;
  try {
    return JSON.parse(text) as T;
  } catch {
    return undefined;
  }
}

export async function getAccessToken(
  tenantId: string,
  clientId: string,
  clientSecret: string,
  resourceUrl: string,
  fetchImpl: FetchLike = fetch,
  now: () => number = Date.now
): Promise<AccessToken> {
  const missing = Object.entries({ tenantId, clientId, clientSecret, resourceUrl })
    .filter(([, value]) => !value || value.trim() === '')
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new AuthError(`Cannot request an access token; missing ${missing.join(', ')}`, {
      remediation: missing.map((name) => `Provide a value for ${name}.`),
    });
  }

  registerSecret(clientSecret);
  const log = rootLogger.auth;
  const scope = `${normalizeResourceUrl(resourceUrl)}/.default`;
  const url = `${LOGIN_BASE_URL}/${encodeURIComponent(tenantId.trim())}/oauth2/v2.0/token`;
  const body = new URLSearchParams({
    grant_type: 'client_credentials',
    client_id: clientId.trim(),
    client_secret: clientSecret,
    scope,
  });

  log.info('Requesting access token', { tenantId: tenantId.trim(), clientId: clientId.trim(), scope });

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });
  } catch (error) {
    throw new AuthError(`Token request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, {
      url,
      cause: error,
    });
  }

  const text = await response.text();
  if (!response.ok) {
    const oauth = parseJson<OAuthErrorResponse>(text);
    const code = oauth?.error;
    throw new AuthError(
      `Token request failed with status ${response.status}${code ? ` (${code})` : ''}`,
      { statusCode: response.status, url, oauthError: code }
    );
  }

  const token = parseJson<TokenResponse>(text);
  if (!token?.access_token) {
    throw new AuthError('Token endpoint returned no access_token', { statusCode: response.status, url });
  }

  registerSecret(token.access_token);
  const expiresIn = Number(token.expires_in ?? 3600);
  const lifetimeSeconds = Number.isFinite(expiresIn) ? expiresIn : 3600;
  const expiresAt = now() + lifetimeSeconds * 1000;
  log.info(`Access token acquired; valid for ${lifetimeSeconds}s`, { expiresAt: new Date(expiresAt).toISOString() });
  return { value: token.access_token, expiresAt };
}

export interface DataverseCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  resourceUrl: string;
}

export interface DataverseSessionOptions {
  fetchImpl?: FetchLike;
  now?: () => number;
  logger?: Logger;
}

/**
 * Holds the run's bearer token and issues Web API calls with it. The token is
 * re-acquired when close to expiry so cleanup after a long test run still works.
 */
export class DataverseSession {
  readonly baseUrl: string;
  private token?: AccessToken;
  private fetchImpl: FetchLike;
  private now: () => number;
  private log: Logger;

  constructor(private credentials: DataverseCredentials, options: DataverseSessionOptions = {}) {
    this.baseUrl = `${normalizeResourceUrl(credentials.resourceUrl)}/api/data/${config.dataverse.apiVersion}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? rootLogger.dataverse;
  }

  hasToken(): boolean {
    return this.token !== undefined;
  }

  async getToken(): Promise<AccessToken> {
    if (!this.token || this.token.expiresAt - this.now() < config.dataverse.tokenRefreshMarginMs) {
      if (this.token) this.log.info('Access token is close to expiry; refreshing');
      const { tenantId, clientId, clientSecret, resourceUrl } = this.credentials;
      this.token = await getAccessToken(tenantId, clientId, clientSecret, resourceUrl, this.fetchImpl, this.now);
    }
    return this.token;
  }

  /**
   * One authenticated OData call. Returns the parsed JSON body, or undefined
   * for empty (204) responses.
   */
  async call<T = unknown>(
    method: HttpMethod,
    path: string,
    body?: unknown,
    extraHeaders: Record<string, string> = {}
  ): Promise<T | undefined> {
    const token = await this.getToken();
    const url = path.startsWith('http') ? path : `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    const startedAt = Date.now();

    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${token.value}`,
        Accept: 'application/json',
        'Content-Type': 'application/json; charset=utf-8',
        'OData-MaxVersion': '4.0',
        'OData-Version': '4.0',
        ...extraHeaders,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    this.log.apiRequest(method, path, response.status, Date.now() - startedAt);
    const text = await response.text();

    if (response.status === 401) {
      throw new DataverseAccessError(url, text);
    }
    if (!response.ok) {
      throw new ApiError(`Dataverse ${method} ${path} failed with status ${response.status}`, response.status, text, {
        url,
      });
    }

    return parseJson<T>(text);
  }

  entityUrl(entitySet: string, id: string): string {
    return `${this.baseUrl}/${entitySet}(${id})`;
  }
}
