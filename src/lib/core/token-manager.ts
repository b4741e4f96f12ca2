import { readFile, writeFile } from 'fs/promises';
import { TOKEN_EXPIRY_MARGIN_SECONDS } from '../constants/defaults.js';
import {
  AuthenticationError,
  CertCenterApiError,
  ConfigError,
  OutputError,
} from '../errors/errors.js';
import type { CertCenterHttpClient } from '../transport/http-client.js';
import {
  AccessTokenRecordSchema,
  TokenResponseSchema,
  type AccessToken,
  type AccessTokenRecord,
} from '../types/token.js';
import { debugToken } from '../utils/debug.js';
import { describeError, epochSeconds } from '../utils/index.js';

export interface TokenManagerOptions {
  http: CertCenterHttpClient;
  tokenEndpoint: string;
  scope: string;
  clientId?: string;
  clientSecret?: string;
  /** JSON file the token is cached in */
  cacheFile: string;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

/** Anything that can hand out a bearer token for the CertCenter API */
export interface AccessTokenProvider {
  getAccessToken(): Promise<AccessToken>;
}

/**
 * OAuth2 client-credentials token manager with a single-file cache
 *
 * A cached token is reused while `now + 30s < expires_at` and it was issued by
 * the configured token endpoint. The cache file is not locked; concurrent runs
 * in the same directory may overwrite each other's token.
 */
export class TokenManager implements AccessTokenProvider {
  private readonly now: () => number;

  constructor(private readonly options: TokenManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(): Promise<AccessToken> {
    const cached = await this.readCachedToken();
    if (cached && this.isUsable(cached)) {
      debugToken('using cached token expires_at=%d host=%s', cached.expires_at, cached.host);
      return {
        value: cached.access_token,
        expiresAt: cached.expires_at,
        host: cached.host,
        source: 'cache',
      };
    }

    const record = await this.requestToken();
    await this.writeCachedToken(record);
    return {
      value: record.access_token,
      expiresAt: record.expires_at,
      host: record.host,
      source: 'network',
    };
  }

  /** Whether `record` can be used without asking the token endpoint again. */
  isUsable(record: AccessTokenRecord): boolean {
    if (record.host !== this.options.tokenEndpoint) {
      debugToken('cached token host %s != %s', record.host, this.options.tokenEndpoint);
      return false;
    }
    return record.expires_at > this.now() / 1000 + TOKEN_EXPIRY_MARGIN_SECONDS;
  }

  /** Read the cache file; a missing or corrupt file counts as no token. */
  async readCachedToken(): Promise<AccessTokenRecord | null> {
    let text: string;
    try {
      text = await readFile(this.options.cacheFile, 'utf-8');
    } catch (err) {
      debugToken('no token cache at %s: %s', this.options.cacheFile, describeError(err));
      return null;
    }

    try {
      const result = AccessTokenRecordSchema.safeParse(JSON.parse(text));
      if (result.success) return result.data;
      debugToken('ignoring malformed token cache %s', this.options.cacheFile);
    } catch (err) {
      debugToken('ignoring unparsable token cache %s: %s', this.options.cacheFile, describeError(err));
    }
    return null;
  }

  private async requestToken(): Promise<AccessTokenRecord> {
    const { http, tokenEndpoint, scope, clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw ConfigError.missingCredentials();
    }

    debugToken('requesting new token from %s', tokenEndpoint);
    const res = await http.postJson(tokenEndpoint, {
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
      scope,
    });

    if (res.statusCode === 400 || res.statusCode === 401) {
      throw AuthenticationError.badCredentials(tokenEndpoint, res.body);
    }
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw CertCenterApiError.httpStatus('token', res.statusCode, res.body);
    }

    const parsed = TokenResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw CertCenterApiError.unexpectedResponse(
        'token',
        res.statusCode,
        res.body,
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }

    const record: AccessTokenRecord = {
      access_token: parsed.data.access_token,
      expires_at: epochSeconds(this.now() + parsed.data.expires_in * 1000),
      host: tokenEndpoint,
    };
    debugToken('token acquired expires_at=%d', record.expires_at);
    return record;
  }

  private async writeCachedToken(record: AccessTokenRecord): Promise<void> {
    try {
      await writeFile(this.options.cacheFile, JSON.stringify(record), 'utf-8');
    } catch (err) {
      throw OutputError.writeFailed(this.options.cacheFile, describeError(err));
    }
    debugToken('token cached at %s', this.options.cacheFile);
  }
}
