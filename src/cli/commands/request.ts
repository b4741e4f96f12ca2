import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import type { Dispatcher } from 'undici';
import {
  CertCenterClient,
  CertCenterHttpClient,
  TokenManager,
  createPinnedResolver,
  enableVerbose,
  issueCertificate,
  loadConfig,
  readCsrFile,
  resolveValidityPeriod,
  type DnsChallenge,
  type IssuanceStep,
  type TxtResolver,
} from '../../index.js';
import { CONFIG_FILE } from '../../lib/constants/defaults.js';
import { createSpinner, heading, kv, render } from '../logger.js';

/** Flags and options accepted by the certificate request command. */
export interface RequestCommandOptions {
  fqdn: string;
  csr: string;
  days?: string;
  verbose?: boolean;
  config?: string;
  output?: string;
  yes?: boolean;
}

/** Process-level collaborators, replaced in tests. */
export interface RequestCommandRuntime {
  dispatcher?: Dispatcher;
  resolver?: TxtResolver;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
}

const STEP_TITLES: Record<IssuanceStep, string> = {
  token: '[1] Getting access token',
  validate: '[2] Validating domain with CertCenter',
  challenge: '[3] Getting domain validation information from CertCenter',
  confirm: '[4] Waiting for DNS record creation',
  dns: '[5] Verifying DNS record',
  order: '[6] Requesting certificate from CertCenter',
  export: '[7] Exporting signed certificate with chain',
};

async function confirmDnsRecord(challenge: DnsChallenge, assumeYes: boolean): Promise<boolean> {
  if (assumeYes) {
    render.dim('--yes given: assuming the TXT record has been created');
    return true;
  }
  // Non-interactive environments (CI, piped execution) cannot answer the prompt
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    console.log('Non-interactive terminal: auto-answering NO for record confirmation.');
    return false;
  }
  return confirm({
    message: chalk.bold(`TXT record with value ${challenge.value} created?`),
    default: true,
  });
}

/** Execute the full DNS-validated issuance flow for a single FQDN. */
export async function handleRequestCommand(
  options: RequestCommandOptions,
  runtime: RequestCommandRuntime = {},
) {
  if (options.verbose) enableVerbose();

  const configPath = options.config || CONFIG_FILE;
  const config = await loadConfig(configPath, runtime.env);
  const validityPeriod = resolveValidityPeriod(options.days, config.certcenter.validityPeriod);
  const csr = await readCsrFile(options.csr);
  const outputDir = options.output || '.';

  heading('Configuration');
  kv('FQDN', options.fqdn);
  kv('CSR', options.csr);
  kv('Product', config.certcenter.productCode);
  kv('Validity', `${validityPeriod} days`);
  kv('DNS Servers', config.dns.nameservers.join(', '));
  kv('Output Dir', outputDir);

  const http = new CertCenterHttpClient({ dispatcher: runtime.dispatcher });
  const tokens = new TokenManager({
    http,
    tokenEndpoint: config.certcenter.tokenEndpoint,
    scope: config.certcenter.scope,
    clientId: config.certcenter.clientId,
    clientSecret: config.certcenter.clientSecret,
    cacheFile: config.tokenCacheFile,
  });
  const certcenter = new CertCenterClient(http, {
    apiBaseUrl: config.certcenter.apiBaseUrl,
    productCode: config.certcenter.productCode,
  });
  const resolver =
    runtime.resolver ?? createPinnedResolver(config.dns.nameservers, config.dns.queryTimeoutMs);

  const spin = createSpinner();
  let current: IssuanceStep | undefined;

  try {
    const result = await issueCertificate(
      { fqdn: options.fqdn, csr, validityPeriod, outputDir },
      { tokens, certcenter, resolver, polling: config.dns, sleep: runtime.sleep },
      {
        onStep: (step) => {
          if (current) spin.succeed(STEP_TITLES[current]);
          current = step;
          spin.start(STEP_TITLES[step]);
        },
        onToken: (token) => {
          const expires = new Date(token.expiresAt * 1000).toISOString();
          spin.update(
            token.source === 'cache'
              ? `Using cached access token (expires ${expires})`
              : `Acquired new access token (expires ${expires})`,
          );
        },
        onChallenge: (challenge) => {
          if (current) spin.succeed(STEP_TITLES[current]);
          current = undefined;
          heading('DNS TXT Record');
          kv('Name', options.fqdn);
          kv('Value', challenge.value);
          if (challenge.example) kv('Example', challenge.example);
        },
        confirmDnsRecord: async (challenge) => {
          spin.stop();
          process.stdout.write('\n');
          return confirmDnsRecord(challenge, options.yes === true);
        },
        onDnsWait: (delayMs) => {
          spin.update(`Waiting ${Math.round(delayMs / 1000)}s for global DNS propagation...`);
        },
        onDnsAttempt: (attempt) => {
          const label = `Attempt ${attempt.attempt}/${attempt.maxAttempts}`;
          spin.update(
            attempt.found
              ? `Record found! Verifying (${label})`
              : `DNS record still not found (${label}${attempt.reason ? `, ${attempt.reason}` : ''}), waiting before next lookup...`,
          );
        },
      },
    );
    if (current) spin.succeed(STEP_TITLES[current]);

    heading('Success');
    kv('Expiration', result.certificate.expiration);
    if (result.certificate.orderId) kv('Order ID', result.certificate.orderId);
    kv('Certificate', result.files.certificatePath);
    kv('Chained Certificate', result.files.chainedPath);
    render.success('PROCESS COMPLETE');
    return result;
  } catch (e) {
    spin.fail(current ? `${STEP_TITLES[current]} failed` : 'Certificate request failed');
    throw e;
  }
}
