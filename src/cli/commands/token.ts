import type { Dispatcher } from 'undici';
import { CertCenterHttpClient, TokenManager, enableVerbose, loadConfig } from '../../index.js';
import { CONFIG_FILE } from '../../lib/constants/defaults.js';
import { heading, kv } from '../logger.js';

export interface TokenCommandOptions {
  config?: string;
  verbose?: boolean;
}

/** Obtain (or reuse) an access token and show where it came from. */
export async function handleTokenCommand(
  options: TokenCommandOptions,
  runtime: { dispatcher?: Dispatcher; env?: NodeJS.ProcessEnv } = {},
) {
  if (options.verbose) enableVerbose();

  const config = await loadConfig(options.config || CONFIG_FILE, runtime.env);
  const tokens = new TokenManager({
    http: new CertCenterHttpClient({ dispatcher: runtime.dispatcher }),
    tokenEndpoint: config.certcenter.tokenEndpoint,
    scope: config.certcenter.scope,
    clientId: config.certcenter.clientId,
    clientSecret: config.certcenter.clientSecret,
    cacheFile: config.tokenCacheFile,
  });
  const token = await tokens.getAccessToken();

  heading('Access Token');
  kv('Source', token.source === 'cache' ? 'cache' : 'token endpoint');
  kv('Issuer', token.host);
  kv('Expires', new Date(token.expiresAt * 1000).toISOString());
  kv('Cache File', config.tokenCacheFile);
  return token;
}
