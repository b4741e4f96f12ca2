import chalk from 'chalk';
import {
  AuthenticationError,
  CancelledError,
  CertCenterApiError,
  ConfigError,
  DnsVerificationError,
} from '../../index.js';

function formatBody(body: unknown): string {
  return typeof body === 'string' ? body : JSON.stringify(body);
}

function printDnsDiagnostics(error: DnsVerificationError): void {
  const context = error.context ?? {};
  if (typeof context.expected === 'string') {
    console.error('  ' + chalk.gray('Expected:') + ' ' + context.expected);
  }
  if (Array.isArray(context.observed)) {
    console.error('  ' + chalk.gray('Observed:'));
    context.observed.forEach((v) => console.error('    - ' + chalk.yellow(String(v))));
  }
}

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof CancelledError) {
    console.error(chalk.yellow(error.message));
  } else if (error instanceof DnsVerificationError) {
    console.error(chalk.red('Error:'), error.message);
    printDnsDiagnostics(error);
  } else if (error instanceof AuthenticationError) {
    console.error(chalk.red('Error:'), error.message);
    const body = error.context?.body;
    if (body !== undefined && body !== null) console.error(chalk.gray(formatBody(body)));
  } else if (error instanceof CertCenterApiError) {
    console.error(chalk.red('Error:'), error.message);
    if (error.body !== undefined && error.body !== null) {
      console.error(chalk.gray(formatBody(error.body)));
    }
  } else if (error instanceof ConfigError) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.gray('See config.example.yaml for the expected layout.'));
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
