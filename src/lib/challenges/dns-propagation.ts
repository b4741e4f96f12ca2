/**
 * DNS TXT propagation poller
 *
 * Waits once for the initial propagation delay, then queries the pinned
 * resolver until any TXT record is visible. The first visible answer decides:
 * a match resolves, a mismatch throws immediately. Attempts are bounded.
 */

import { DnsVerificationError } from '../errors/errors.js';
import { debugDns } from '../utils/debug.js';
import { describeError, sleep as defaultSleep } from '../utils/index.js';
import { validateTxtSet, type TxtResolver, type TxtValidationResult } from './dns-txt-validator.js';

/** Progress report for one lookup */
export interface PropagationAttempt {
  attempt: number;
  maxAttempts: number;
  /** Whether any TXT record was returned */
  found: boolean;
  /** Why nothing was found (resolver error code or message) */
  reason?: string;
}

export interface PropagationOptions {
  resolver: TxtResolver;
  initialDelayMs: number;
  intervalMs: number;
  maxAttempts: number;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called before the initial delay */
  onWait?: (delayMs: number) => void;
  onAttempt?: (attempt: PropagationAttempt) => void;
}

export async function waitForTxtRecord(
  name: string,
  expected: string,
  options: PropagationOptions,
): Promise<TxtValidationResult> {
  const { resolver, initialDelayMs, intervalMs, maxAttempts, onWait, onAttempt } = options;
  const sleep = options.sleep ?? defaultSleep;

  onWait?.(initialDelayMs);
  await sleep(initialDelayMs);

  let lastReason: string | undefined;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let records: string[][] = [];
    try {
      records = await resolver.resolveTxt(name);
      lastReason = records.length === 0 ? 'empty answer' : undefined;
    } catch (err) {
      lastReason = describeError(err);
    }
    debugDns(
      'TXT %s attempt %d/%d records=%j reason=%s',
      name,
      attempt,
      maxAttempts,
      records,
      lastReason ?? '-',
    );

    if (records.length > 0) {
      onAttempt?.({ attempt, maxAttempts, found: true });
      const result = validateTxtSet(records, expected);
      if (result.ok) return result;
      throw DnsVerificationError.mismatch(name, expected, result.allValues);
    }

    onAttempt?.({ attempt, maxAttempts, found: false, reason: lastReason });
    if (attempt < maxAttempts) {
      await sleep(intervalMs);
    }
  }

  throw DnsVerificationError.timeout(name, maxAttempts, lastReason);
}
