import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { OutputError } from '../errors/errors.js';
import type { CertificateResult } from '../types/certcenter.js';
import { describeError } from '../utils/index.js';

export interface CertificateFiles {
  /** `<fqdn>_cert.pem`: the leaf certificate only */
  certificatePath: string;
  /** `<fqdn>_cert-chained.pem`: leaf certificate, newline, intermediate */
  chainedPath: string;
}

/** File names the certificate for `fqdn` is exported under. */
export function certificateFilePaths(fqdn: string, outputDir: string): CertificateFiles {
  return {
    certificatePath: join(outputDir, `${fqdn}_cert.pem`),
    chainedPath: join(outputDir, `${fqdn}_cert-chained.pem`),
  };
}

async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (err) {
    throw OutputError.writeFailed(path, describeError(err));
  }
}

/** Export the signed certificate and the chained certificate as PEM files. */
export async function writeCertificateFiles(
  fqdn: string,
  result: Pick<CertificateResult, 'certificate' | 'intermediate'>,
  outputDir = '.',
): Promise<CertificateFiles> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw OutputError.writeFailed(outputDir, describeError(err));
  }

  const files = certificateFilePaths(fqdn, outputDir);
  await writeOutput(files.certificatePath, result.certificate);
  await writeOutput(files.chainedPath, `${result.certificate}\n${result.intermediate}`);
  return files;
}
