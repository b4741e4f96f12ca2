/**
 * Shared fixtures: in-process CertCenter stand-in, scripted resolver, temp dirs
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { MockAgent } from 'undici';
import type { TxtResolver } from '../src/index.js';

export const TOKEN_ORIGIN = 'https://auth.certcenter.test';
export const TOKEN_PATH = '/oauth2/token';
export const TOKEN_ENDPOINT = TOKEN_ORIGIN + TOKEN_PATH;
export const API_ORIGIN = 'https://api.certcenter.test';
export const API_BASE_URL = API_ORIGIN + '/rest/v1';

export const FQDN = 'www.example.test';
export const PRODUCT_CODE = 'AlwaysOnSSL.AlwaysOnSSL';
export const CHALLENGE_VALUE = 'test-dns-challenge-value';
export const CSR_PEM =
  '-----BEGIN CERTIFICATE REQUEST-----\nTUlJQ3Rlc3QtY3Ny\n-----END CERTIFICATE REQUEST-----\n';
export const CERT_PEM = '-----BEGIN CERTIFICATE-----\nbGVhZi1jZXJ0\n-----END CERTIFICATE-----';
export const INTERMEDIATE_PEM =
  '-----BEGIN CERTIFICATE-----\naW50ZXJtZWRpYXRl\n-----END CERTIFICATE-----';

export type Interceptable = ReturnType<MockAgent['get']>;

export interface CertCenterMock {
  agent: MockAgent;
  auth: Interceptable;
  api: Interceptable;
}

/** MockAgent with network access disabled; unmatched requests reject. */
export function createCertCenterMock(): CertCenterMock {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return { agent, auth: agent.get(TOKEN_ORIGIN), api: agent.get(API_ORIGIN) };
}

/** Body matcher that accepts only a JSON body deep-equal to `expected`. */
export function jsonBody(expected: unknown): (body: string) => boolean {
  const wanted = JSON.stringify(expected);
  return (body: string) => JSON.stringify(JSON.parse(body)) === wanted;
}

export type ScriptedAnswer = string[][] | Error;

/** Resolver returning scripted answers in order; repeats the last one. */
export class ScriptedResolver implements TxtResolver {
  readonly queries: string[] = [];

  constructor(private readonly answers: ScriptedAnswer[]) {}

  async resolveTxt(name: string): Promise<string[][]> {
    this.queries.push(name);
    const answer = this.answers[Math.min(this.queries.length - 1, this.answers.length - 1)];
    if (answer === undefined) throw notFound(name);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

/** Error shaped like the one dns/promises raises for a missing record */
export function notFound(name: string): Error {
  return Object.assign(new Error(`queryTxt ENOTFOUND ${name}`), { code: 'ENOTFOUND' });
}

/** Sleep stand-in that records requested delays and returns at once */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'dvcert-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
