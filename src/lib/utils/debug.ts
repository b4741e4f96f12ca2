/**
 * Debug logging utilities for dvcert
 *
 * Built on the `debug` package. Enable with the DEBUG environment variable:
 *
 * DEBUG=dvcert:* - All debug output
 * DEBUG=dvcert:http - Only HTTP debug
 * DEBUG=dvcert:token - Only token cache debug
 * DEBUG=dvcert:dns - Only DNS propagation debug
 *
 * The CLI `--verbose` flag calls {@link enableVerbose}.
 */

import debug from 'debug';

const root = debug('dvcert');

export const debugHttp = root.extend('http');
export const debugToken = root.extend('token');
export const debugDns = root.extend('dns');
export const debugConfig = root.extend('config');
export const debugMain = root.extend('main');

/** Turn on every dvcert namespace while keeping whatever DEBUG already selects. */
export function enableVerbose(): void {
  const current = process.env.DEBUG;
  debug.enable(current ? `${current},dvcert:*` : 'dvcert:*');
}
