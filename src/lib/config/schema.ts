import { z } from 'zod';
import {
  CERTCENTER_API_BASE_URL,
  CERTCENTER_TOKEN_ENDPOINT,
  CERTCENTER_TOKEN_SCOPE,
  DNS_INITIAL_DELAY_MS,
  DNS_NAMESERVERS,
  DNS_POLL_INTERVAL_MS,
  DNS_POLL_MAX_ATTEMPTS,
  DNS_QUERY_TIMEOUT_MS,
  TOKEN_CACHE_FILE,
  VALIDITY_MAX_DAYS,
  VALIDITY_MIN_DAYS,
} from '../constants/defaults.js';

export const ValidityPeriodSchema = z.coerce
  .number()
  .int()
  .min(VALIDITY_MIN_DAYS)
  .max(VALIDITY_MAX_DAYS);

/** `--days` as typed on the command line: plain decimal digits only */
export const ValidityDaysFlagSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a whole number of days')
  .pipe(ValidityPeriodSchema);

export const CertCenterConfigSchema = z.object({
  productCode: z.string().min(1),
  validityPeriod: ValidityPeriodSchema,
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  scope: z.string().min(1).default(CERTCENTER_TOKEN_SCOPE),
  tokenEndpoint: z.string().url().default(CERTCENTER_TOKEN_ENDPOINT),
  apiBaseUrl: z.string().url().default(CERTCENTER_API_BASE_URL),
});

export const DnsPollingConfigSchema = z.object({
  nameservers: z
    .array(z.string().ip())
    .min(1)
    .default([...DNS_NAMESERVERS]),
  initialDelayMs: z.number().int().nonnegative().default(DNS_INITIAL_DELAY_MS),
  intervalMs: z.number().int().nonnegative().default(DNS_POLL_INTERVAL_MS),
  maxAttempts: z.number().int().positive().default(DNS_POLL_MAX_ATTEMPTS),
  queryTimeoutMs: z.number().int().positive().default(DNS_QUERY_TIMEOUT_MS),
});

export const ConfigFileSchema = z.object({
  certcenter: CertCenterConfigSchema,
  dns: DnsPollingConfigSchema.default({}),
  tokenCacheFile: z.string().min(1).default(TOKEN_CACHE_FILE),
});

export type CertCenterConfig = z.infer<typeof CertCenterConfigSchema>;
export type DnsPollingConfig = z.infer<typeof DnsPollingConfigSchema>;

/** Fully resolved configuration passed explicitly through the pipeline */
export type DvCertConfig = Readonly<z.infer<typeof ConfigFileSchema>>;
