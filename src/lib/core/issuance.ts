import { waitForTxtRecord, type PropagationAttempt } from '../challenges/dns-propagation.js';
import type { TxtResolver, TxtValidationResult } from '../challenges/dns-txt-validator.js';
import type { DnsPollingConfig } from '../config/schema.js';
import { CancelledError } from '../errors/errors.js';
import type { CertificateResult, DnsChallenge } from '../types/certcenter.js';
import type { AccessToken } from '../types/token.js';
import { debugMain } from '../utils/debug.js';
import type { CertCenterClient } from './certcenter-client.js';
import { writeCertificateFiles, type CertificateFiles } from './certificate-writer.js';
import type { AccessTokenProvider } from './token-manager.js';

/** Pipeline stages, in execution order */
export const ISSUANCE_STEPS = [
  'token',
  'validate',
  'challenge',
  'confirm',
  'dns',
  'order',
  'export',
] as const;

export type IssuanceStep = (typeof ISSUANCE_STEPS)[number];

export interface IssuanceRequest {
  /** Subject FQDN; also the name whose TXT record is checked */
  fqdn: string;
  /** PKCS#10 CSR text, passed through unmodified */
  csr: string;
  /** Validity in days */
  validityPeriod: number;
  /** Directory the PEM files are written to (default: cwd) */
  outputDir?: string;
}

export interface IssuanceDependencies {
  tokens: AccessTokenProvider;
  certcenter: Pick<CertCenterClient, 'validateName' | 'getDnsData' | 'requestCertificate'>;
  resolver: TxtResolver;
  polling: Pick<DnsPollingConfig, 'initialDelayMs' | 'intervalMs' | 'maxAttempts'>;
  sleep?: (ms: number) => Promise<void>;
}

/** Progress callbacks; the CLI renders them, tests inspect them */
export interface IssuanceHooks {
  onStep?: (step: IssuanceStep) => void;
  onToken?: (token: AccessToken) => void;
  onChallenge?: (challenge: DnsChallenge) => void;
  /** Resolve true once the TXT record has been created; false aborts. */
  confirmDnsRecord?: (challenge: DnsChallenge) => Promise<boolean>;
  onDnsWait?: (delayMs: number) => void;
  onDnsAttempt?: (attempt: PropagationAttempt) => void;
  onCertificate?: (certificate: CertificateResult) => void;
}

export interface IssuanceResult {
  token: AccessToken;
  challenge: DnsChallenge;
  txt: TxtValidationResult;
  certificate: CertificateResult;
  files: CertificateFiles;
}

/**
 * Run DNS-validated issuance for one FQDN, start to finish.
 *
 * A certificate is only ordered after the TXT record matched the challenge.
 */
export async function issueCertificate(
  request: IssuanceRequest,
  deps: IssuanceDependencies,
  hooks: IssuanceHooks = {},
): Promise<IssuanceResult> {
  const { fqdn, csr, validityPeriod, outputDir = '.' } = request;
  debugMain('issuance start fqdn=%s validityPeriod=%d', fqdn, validityPeriod);

  hooks.onStep?.('token');
  const token = await deps.tokens.getAccessToken();
  hooks.onToken?.(token);

  hooks.onStep?.('validate');
  await deps.certcenter.validateName(token.value, fqdn);

  hooks.onStep?.('challenge');
  const challenge = await deps.certcenter.getDnsData(token.value, csr);
  hooks.onChallenge?.(challenge);

  if (hooks.confirmDnsRecord) {
    hooks.onStep?.('confirm');
    const proceed = await hooks.confirmDnsRecord(challenge);
    if (!proceed) throw CancelledError.byUser('confirm');
  }

  hooks.onStep?.('dns');
  const txt = await waitForTxtRecord(fqdn, challenge.value, {
    resolver: deps.resolver,
    initialDelayMs: deps.polling.initialDelayMs,
    intervalMs: deps.polling.intervalMs,
    maxAttempts: deps.polling.maxAttempts,
    sleep: deps.sleep,
    onWait: hooks.onDnsWait,
    onAttempt: hooks.onDnsAttempt,
  });

  hooks.onStep?.('order');
  const certificate = await deps.certcenter.requestCertificate(token.value, csr, validityPeriod);
  hooks.onCertificate?.(certificate);

  hooks.onStep?.('export');
  const files = await writeCertificateFiles(fqdn, certificate, outputDir);
  debugMain('issuance complete fqdn=%s files=%j', fqdn, files);

  return { token, challenge, txt, certificate, files };
}
