/**
 * Default configuration constants for dvcert
 *
 * Centralized defaults for the CertCenter endpoints, token caching and DNS
 * propagation polling. Used as fallbacks when the config file omits a value.
 */

// CertCenter endpoints
export const CERTCENTER_TOKEN_ENDPOINT = 'https://api.certcenter.com/oauth2/token';
export const CERTCENTER_API_BASE_URL = 'https://api.certcenter.com/rest/v1';
export const CERTCENTER_TOKEN_SCOPE = 'order';

// Token cache
export const TOKEN_CACHE_FILE = 'token.json';
export const TOKEN_EXPIRY_MARGIN_SECONDS = 30;

// DNS propagation polling
export const DNS_NAMESERVERS = ['8.8.8.8'] as const;
export const DNS_INITIAL_DELAY_MS = 30_000; // 30 seconds
export const DNS_POLL_INTERVAL_MS = 30_000; // 30 seconds
export const DNS_POLL_MAX_ATTEMPTS = 120; // one hour at the default interval
export const DNS_QUERY_TIMEOUT_MS = 5_000;

// Certificate validity bounds (days)
export const VALIDITY_MIN_DAYS = 1;
export const VALIDITY_MAX_DAYS = 365;

// CLI
export const CONFIG_FILE = 'config.yaml';
