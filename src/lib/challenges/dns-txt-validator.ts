import { Resolver } from 'dns/promises';

export interface TxtValidationResult {
  ok: boolean;
  /** Value that matched the expected challenge */
  matched?: string;
  /** All normalized values (concatenated TXT fragments) */
  allValues: string[];
  /** Reasons if ok === false */
  reasons?: string[];
}

/** Minimal resolver surface the propagation poller depends on */
export interface TxtResolver {
  resolveTxt(name: string): Promise<string[][]>;
}

/** Concatenate TXT record fragments (as returned by dns.resolveTxt) */
export function normalizeTxtFragments(fragments: ReadonlyArray<string>): string {
  // DNS TXT can come as ["part1","part2"] — they need to be joined
  return fragments.join('');
}

/**
 * Compare an array of TXT records, as from dns.resolveTxt(name), to the
 * expected challenge value. Success when at least one value is byte-for-byte
 * equal to `expected`.
 */
export function validateTxtSet(
  records: ReadonlyArray<ReadonlyArray<string>>,
  expected: string,
): TxtValidationResult {
  const allValues = records.map(normalizeTxtFragments);

  const matched = allValues.find((val) => val === expected);
  if (matched !== undefined) {
    return { ok: true, matched, allValues };
  }

  if (allValues.length === 0) {
    return { ok: false, allValues, reasons: ['No TXT values returned'] };
  }
  return {
    ok: false,
    allValues,
    reasons: allValues.map((val) => `'${val}' doesn't match the expected value`),
  };
}

/** Create a resolver pinned to the given name servers (IPs). */
export function createPinnedResolver(nameservers: string[], timeoutMs?: number): TxtResolver {
  const resolver = new Resolver(timeoutMs !== undefined ? { timeout: timeoutMs } : undefined);
  resolver.setServers(nameservers);
  return resolver;
}
