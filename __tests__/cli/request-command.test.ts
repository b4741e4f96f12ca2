import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { handleRequestCommand } from '../../src/cli/commands/request.js';
import { handleTokenCommand } from '../../src/cli/commands/token.js';
import { ConfigError } from '../../src/index.js';
import {
  API_BASE_URL,
  CERT_PEM,
  CHALLENGE_VALUE,
  CSR_PEM,
  FQDN,
  INTERMEDIATE_PEM,
  PRODUCT_CODE,
  TOKEN_ENDPOINT,
  TOKEN_PATH,
  ScriptedResolver,
  createCertCenterMock,
  jsonBody,
  makeTempDir,
  recordingSleep,
  removeTempDir,
  type CertCenterMock,
} from '../test-utils.js';

describe('request command', () => {
  let dir: string;
  let configPath: string;
  let csrPath: string;
  let mock: CertCenterMock;

  beforeEach(() => {
    dir = makeTempDir();
    configPath = join(dir, 'config.yaml');
    csrPath = join(dir, 'www.csr');
    writeFileSync(
      configPath,
      [
        'certcenter:',
        `  productCode: ${PRODUCT_CODE}`,
        '  validityPeriod: 180',
        '  clientId: test-client',
        '  clientSecret: test-secret',
        `  tokenEndpoint: ${TOKEN_ENDPOINT}`,
        `  apiBaseUrl: ${API_BASE_URL}`,
        'dns:',
        '  maxAttempts: 2',
        `tokenCacheFile: ${join(dir, 'token.json')}`,
        '',
      ].join('\n'),
    );
    writeFileSync(csrPath, CSR_PEM);
    mock = createCertCenterMock();
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await mock.agent.close();
    removeTempDir(dir);
  });

  test('issues a certificate end to end with --days overriding the config', async () => {
    mock.auth
      .intercept({ path: TOKEN_PATH, method: 'POST' })
      .reply(200, { access_token: 'test-token', expires_in: 3600 });
    mock.api
      .intercept({ path: '/rest/v1/ValidateName', method: 'POST' })
      .reply(200, { success: true, IsQualified: true });
    mock.api
      .intercept({ path: '/rest/v1/DNSData', method: 'POST' })
      .reply(200, { DNSAuthDetails: { DNSValue: CHALLENGE_VALUE } });
    mock.api
      .intercept({
        path: '/rest/v1/Order',
        method: 'POST',
        body: jsonBody({
          OrderParameters: {
            ProductCode: PRODUCT_CODE,
            CSR: CSR_PEM,
            ValidityPeriod: 90,
            DVAuthMethod: 'DNS',
          },
        }),
      })
      .reply(200, {
        success: true,
        Fulfillment: {
          Certificate: CERT_PEM,
          Intermediate: INTERMEDIATE_PEM,
          Certificate_PKCS7: 'test-pkcs7',
          EndDate: '2027-01-15T23:59:59Z',
        },
      });

    const outDir = join(dir, 'out');
    const { delays, sleep } = recordingSleep();
    const result = await handleRequestCommand(
      { fqdn: FQDN, csr: csrPath, days: '90', config: configPath, output: outDir, yes: true },
      {
        dispatcher: mock.agent,
        resolver: new ScriptedResolver([[[CHALLENGE_VALUE]]]),
        sleep,
        env: {},
      },
    );

    expect(result.certificate.expiration).toBe('2027-01-15T23:59:59Z');
    expect(delays).toEqual([30_000]);
    expect(readFileSync(join(outDir, `${FQDN}_cert.pem`), 'utf-8')).toBe(CERT_PEM);
    expect(readFileSync(join(outDir, `${FQDN}_cert-chained.pem`), 'utf-8')).toBe(
      `${CERT_PEM}\n${INTERMEDIATE_PEM}`,
    );
    expect(JSON.parse(readFileSync(join(dir, 'token.json'), 'utf-8'))).toMatchObject({
      access_token: 'test-token',
      host: TOKEN_ENDPOINT,
    });
  });

  test('rejects an invalid --days value before any network call', async () => {
    await expect(
      handleRequestCommand(
        { fqdn: FQDN, csr: csrPath, days: '400', config: configPath, yes: true },
        { dispatcher: mock.agent, resolver: new ScriptedResolver([]), env: {} },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('token command', () => {
  let dir: string;
  let mock: CertCenterMock;

  beforeEach(() => {
    dir = makeTempDir();
    mock = createCertCenterMock();
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await mock.agent.close();
    removeTempDir(dir);
  });

  test('acquires a token once and then serves it from the cache', async () => {
    const configPath = join(dir, 'config.yaml');
    writeFileSync(
      configPath,
      [
        'certcenter:',
        '  productCode: P',
        '  validityPeriod: 30',
        `  tokenEndpoint: ${TOKEN_ENDPOINT}`,
        `tokenCacheFile: ${join(dir, 'token.json')}`,
        '',
      ].join('\n'),
    );
    mock.auth
      .intercept({
        path: TOKEN_PATH,
        method: 'POST',
        body: jsonBody({
          grant_type: 'client_credentials',
          client_id: 'env-client',
          client_secret: 'env-secret',
          scope: 'order',
        }),
      })
      .reply(200, { access_token: 'test-token', expires_in: 3600 });
    const env = { CERTCENTER_CLIENT_ID: 'env-client', CERTCENTER_CLIENT_SECRET: 'env-secret' };

    const first = await handleTokenCommand(
      { config: configPath },
      { dispatcher: mock.agent, env },
    );
    const second = await handleTokenCommand(
      { config: configPath },
      { dispatcher: mock.agent, env },
    );

    expect(first.source).toBe('network');
    expect(second).toEqual({ ...first, source: 'cache' });
  });
});
