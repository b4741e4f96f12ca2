import { readFile } from 'fs/promises';
import { CsrError } from '../errors/errors.js';
import { describeError } from '../utils/index.js';

/**
 * Read a PKCS#10 CSR from disk. The content is passed to CertCenter as-is.
 */
export async function readCsrFile(path: string): Promise<string> {
  let csr: string;
  try {
    csr = await readFile(path, 'utf-8');
  } catch (err) {
    throw CsrError.unreadable(path, describeError(err));
  }
  if (csr.trim() === '') throw CsrError.empty(path);
  return csr;
}
