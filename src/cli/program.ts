import { Command } from 'commander';
import { getPackageInfo } from '../index.js';
import { handleError } from './utils/errors.js';
import { handleRequestCommand } from './commands/request.js';
import { handleTokenCommand } from './commands/token.js';

interface RawRequestOptions {
  fqdn: string;
  csr: string;
  days?: string;
  verbose?: boolean;
  config?: string;
  output?: string;
  yes?: boolean;
}

interface RawTokenOptions {
  config?: string;
  verbose?: boolean;
}

/** Build a Commander program instance for the dvcert CLI. */
export function createCli(): Command {
  const program = new Command();
  const pkg = getPackageInfo();

  program
    .name('dvcert')
    .description('DNS-validated certificate requests for CertCenter')
    .version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.DVCERT_CLI_TEST) {
    program.exitOverride();
  }

  // Helper deciding whether to exit (skip during tests)
  function exitOnError() {
    if (process.env.DVCERT_CLI_TEST) return; // allow tests to assert thrown errors
    process.exit(1);
  }

  program
    .command('request', { isDefault: true })
    .description('Request a DNS-validated certificate for one FQDN')
    .requiredOption('-f, --fqdn <fqdn>', 'Subject FQDN')
    .requiredOption('-c, --csr <file>', 'CSR filename (PKCS#10, PEM)')
    .option('-d, --days <days>', 'Certificate validity in days, 1-365 (default: from config)')
    .option('-v, --verbose', 'Verbose logging')
    .option('--config <file>', 'Config file', 'config.yaml')
    .option('-o, --output <dir>', 'Output directory for certificate files', '.')
    .option('-y, --yes', 'Do not ask for confirmation after the DNS record is shown')
    .action(async (opts: RawRequestOptions) => {
      try {
        await handleRequestCommand({
          fqdn: opts.fqdn,
          csr: opts.csr,
          days: opts.days,
          verbose: opts.verbose,
          config: opts.config,
          output: opts.output,
          yes: opts.yes,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('token')
    .description('Obtain or reuse the cached CertCenter access token')
    .option('--config <file>', 'Config file', 'config.yaml')
    .option('-v, --verbose', 'Verbose logging')
    .action(async (opts: RawTokenOptions) => {
      try {
        await handleTokenCommand({ config: opts.config, verbose: opts.verbose });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code =
      typeof err === 'object' && err !== null && 'code' in err ? String(err.code) : undefined;
    // help and version output are not failures in test mode
    if (
      !process.env.DVCERT_CLI_TEST ||
      (code !== 'commander.helpDisplayed' && code !== 'commander.version')
    ) {
      throw err;
    }
  }
  return program;
}
