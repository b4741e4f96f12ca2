import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { load, YAMLException } from 'js-yaml';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../errors/errors.js';
import { debugConfig } from '../utils/debug.js';
import { describeError, errorCode } from '../utils/index.js';
import { ConfigFileSchema, ValidityDaysFlagSchema, type DvCertConfig } from './schema.js';

/** Environment variables that override credentials from the config file */
export const CONFIG_ENV = {
  clientId: 'CERTCENTER_CLIENT_ID',
  clientSecret: 'CERTCENTER_CLIENT_SECRET',
} as const;

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Validate an already-parsed config document.
 *
 * @param source Label used in error messages (usually the file path)
 */
export function parseConfig(
  raw: unknown,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): DvCertConfig {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw ConfigError.invalid(source, result.error.issues.map(formatIssue));
  }

  const parsed = result.data;
  const clientId = fromEnv(env, CONFIG_ENV.clientId) ?? parsed.certcenter.clientId;
  const clientSecret = fromEnv(env, CONFIG_ENV.clientSecret) ?? parsed.certcenter.clientSecret;

  return {
    ...parsed,
    certcenter: { ...parsed.certcenter, clientId, clientSecret },
    tokenCacheFile: resolve(parsed.tokenCacheFile),
  };
}

/** Read and validate the YAML config file at `path`. */
export async function loadConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DvCertConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') throw ConfigError.fileNotFound(path);
    throw ConfigError.unreadable(path, describeError(err));
  }

  let raw: unknown;
  try {
    raw = load(text, { filename: path });
  } catch (err) {
    if (err instanceof YAMLException) throw ConfigError.unreadable(path, err.reason);
    throw err;
  }

  const config = parseConfig(raw, path, env);
  debugConfig(
    'loaded %s productCode=%s validityPeriod=%d tokenCacheFile=%s nameservers=%o',
    path,
    config.certcenter.productCode,
    config.certcenter.validityPeriod,
    config.tokenCacheFile,
    config.dns.nameservers,
  );
  return config;
}

/**
 * Pick the certificate validity in days: the `--days` flag when given,
 * otherwise the config file value.
 */
export function resolveValidityPeriod(days: string | undefined, fallback: number): number {
  if (days === undefined || days.trim() === '') return fallback;
  const result = ValidityDaysFlagSchema.safeParse(days.trim());
  if (!result.success) throw ConfigError.invalidValidity(days);
  return result.data;
}
