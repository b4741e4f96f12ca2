import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';

// Mock command handlers BEFORE importing program factory
jest.mock('../../src/cli/commands/request.js', () => ({
  handleRequestCommand: jest.fn(async () => {}),
}));
jest.mock('../../src/cli/commands/token.js', () => ({
  handleTokenCommand: jest.fn(async () => {}),
}));

import { runCli } from '../../src/cli/program.js';
import { handleRequestCommand } from '../../src/cli/commands/request.js';
import { handleTokenCommand } from '../../src/cli/commands/token.js';

const handleRequest = jest.mocked(handleRequestCommand);
const handleToken = jest.mocked(handleTokenCommand);

describe('dvcert CLI', () => {
  beforeEach(() => {
    process.env.DVCERT_CLI_TEST = '1';
    handleRequest.mockClear();
    handleToken.mockClear();
  });

  afterEach(() => {
    delete process.env.DVCERT_CLI_TEST;
    jest.restoreAllMocks();
  });

  test('shows help without failing', async () => {
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    await expect(runCli(['--help'])).resolves.toBeDefined();
  });

  test('passes every request flag to the request command', async () => {
    await runCli([
      'request',
      '--fqdn',
      'www.example.test',
      '--csr',
      './www.csr',
      '--days',
      '90',
      '--verbose',
      '--config',
      './custom.yaml',
      '--output',
      './certs',
      '--yes',
    ]);

    expect(handleRequest).toHaveBeenCalledTimes(1);
    expect(handleRequest.mock.calls[0][0]).toEqual({
      fqdn: 'www.example.test',
      csr: './www.csr',
      days: '90',
      verbose: true,
      config: './custom.yaml',
      output: './certs',
      yes: true,
    });
  });

  test('runs request as the default command with short flags', async () => {
    await runCli(['-f', 'www.example.test', '-c', 'www.csr', '-d', '30', '-v']);

    expect(handleRequest).toHaveBeenCalledTimes(1);
    expect(handleRequest.mock.calls[0][0]).toMatchObject({
      fqdn: 'www.example.test',
      csr: 'www.csr',
      days: '30',
      verbose: true,
      config: 'config.yaml',
      output: '.',
    });
  });

  test('requires --fqdn', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    await expect(runCli(['request', '--csr', 'www.csr'])).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
    expect(handleRequest).not.toHaveBeenCalled();
  });

  test('token command forwards options', async () => {
    await runCli(['token', '--config', './custom.yaml']);
    expect(handleToken).toHaveBeenCalledTimes(1);
    expect(handleToken.mock.calls[0][0]).toEqual({ config: './custom.yaml', verbose: undefined });
  });
});
