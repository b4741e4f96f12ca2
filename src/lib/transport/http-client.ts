import { request, type Dispatcher } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { describeError } from '../utils/index.js';
import { buildUserAgent } from '../utils/user-agent.js';

export interface CertCenterHttpClientOptions {
  /** Undici dispatcher used for every request (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  /** Override the User-Agent header */
  userAgent?: string;
}

/** Response with the body already read and parsed */
export interface ParsedResponse<T = unknown> {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the body is JSON, the raw text otherwise, null when empty */
  body: T;
  /** Raw response text */
  text: string;
}

/**
 * JSON-over-HTTPS transport for the CertCenter REST and OAuth endpoints
 *
 * Features:
 * - Automatic User-Agent injection
 * - Optional bearer authorization
 * - Lenient body parsing (JSON when it parses, text otherwise)
 * - Debug logging of every request and response under dvcert:http
 *
 * Non-2xx responses are returned, not thrown: CertCenter reports most
 * failures as `{ success: false }` bodies and callers decide what an error is.
 */
export class CertCenterHttpClient {
  private readonly dispatcher?: Dispatcher;
  private readonly userAgent: string;

  constructor(options: CertCenterHttpClientOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.userAgent = options.userAgent ?? buildUserAgent();
  }

  private buildHeaders(headers: Record<string, string>, bearer?: string): Record<string, string> {
    const result: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...headers,
    };
    const hasUA = Object.keys(result).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      result['User-Agent'] = this.userAgent;
    }
    if (bearer !== undefined) {
      result['Authorization'] = `Bearer ${bearer}`;
    }
    return result;
  }

  /** POST `payload` as JSON, optionally authorized with a bearer token. */
  async postJson(
    url: string,
    payload: unknown,
    options: { bearer?: string; headers?: Record<string, string> } = {},
  ): Promise<ParsedResponse> {
    const headers = this.buildHeaders(options.headers ?? {}, options.bearer);
    const body = JSON.stringify(payload);
    debugHttp('POST %s init body=%j', url, this.describeBodyForDebug(payload, body.length));
    const start = Date.now();

    try {
      const res = await request(url, {
        method: 'POST',
        headers,
        body,
        ...(this.dispatcher && { dispatcher: this.dispatcher }),
      });
      debugHttp(
        'POST %s response status=%d durationMs=%d content-type=%s',
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      const text = await res.body.text();
      const parsed = this.parseResponseBody(text);
      debugHttp('POST %s response body=%j', url, parsed);

      return { statusCode: res.statusCode, headers: res.headers, body: parsed, text };
    } catch (err) {
      debugHttp('POST %s network error: %s', url, describeError(err));
      throw err;
    }
  }

  private parseResponseBody(text: string): unknown {
    if (text.trim() === '') return null;
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private describeBodyForDebug(payload: unknown, length: number): unknown {
    const visible =
      typeof payload === 'object' && payload !== null && 'client_secret' in payload
        ? { ...payload, client_secret: '***' }
        : payload;
    const preview = JSON.stringify(visible) ?? '';
    return {
      type: 'json',
      length,
      preview: preview.length > 120 ? preview.slice(0, 120) + '…' : preview,
    };
  }
}
