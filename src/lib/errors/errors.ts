/**
 * dvcert error classes
 *
 * Typed representation of every failure the issuance pipeline can hit. Each
 * class carries a stable `code`, a coarse `type` and a context record so the
 * CLI can print targeted hints.
 */

/**
 * Base class for all dvcert errors
 */
export abstract class DvCertError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or malformed configuration and command-line input
 */
export class ConfigError extends DvCertError {
  readonly code = 'CONFIG_ERROR';
  readonly type = 'config';

  static fileNotFound(path: string): ConfigError {
    return new ConfigError(`Config file not found: ${path}`, { path });
  }

  static unreadable(path: string, reason: string): ConfigError {
    return new ConfigError(`Config file ${path} could not be parsed: ${reason}`, {
      path,
      reason,
    });
  }

  static invalid(path: string, issues: string[]): ConfigError {
    return new ConfigError(`Invalid config file ${path}: ${issues.join('; ')}`, { path, issues });
  }

  static missingCredentials(): ConfigError {
    return new ConfigError('clientId or clientSecret not defined in config file', {
      missing: ['certcenter.clientId', 'certcenter.clientSecret'],
    });
  }

  static invalidValidity(value: string): ConfigError {
    return new ConfigError(`Certificate validity must be a whole number of days, 1-365: ${value}`, {
      value,
    });
  }
}

/**
 * The CSR file could not be used
 */
export class CsrError extends DvCertError {
  readonly code = 'CSR_ERROR';
  readonly type = 'csr';

  static unreadable(path: string, reason: string): CsrError {
    return new CsrError(`Unable to read CSR file ${path}: ${reason}`, { path, reason });
  }

  static empty(path: string): CsrError {
    return new CsrError(`CSR file ${path} is empty`, { path });
  }
}

/**
 * OAuth token acquisition or bearer authorization was rejected
 */
export class AuthenticationError extends DvCertError {
  readonly code = 'AUTHENTICATION_ERROR';
  readonly type = 'authentication';

  static badCredentials(endpoint: string, body: unknown): AuthenticationError {
    return new AuthenticationError(
      'Token request rejected. Check clientId and clientSecret in the config file',
      { endpoint, body },
    );
  }

  static authorizationFailed(operation: string, body: unknown): AuthenticationError {
    return new AuthenticationError(
      `CertCenter authorization failed for ${operation}. Check the access token`,
      { operation, body },
    );
  }
}

/**
 * Unexpected HTTP status or response shape from the CertCenter API
 */
export class CertCenterApiError extends DvCertError {
  readonly code = 'CERTCENTER_API_ERROR';
  readonly type = 'api';

  constructor(
    message: string,
    public readonly operation: string,
    public readonly statusCode?: number,
    public readonly body?: unknown,
  ) {
    super(message, { operation, statusCode, body });
  }

  static httpStatus(operation: string, statusCode: number, body: unknown): CertCenterApiError {
    return new CertCenterApiError(
      `${operation} failed with HTTP ${statusCode}`,
      operation,
      statusCode,
      body,
    );
  }

  static unexpectedResponse(
    operation: string,
    statusCode: number,
    body: unknown,
    issues: string[],
  ): CertCenterApiError {
    return new CertCenterApiError(
      `Unexpected ${operation} response: ${issues.join('; ')}`,
      operation,
      statusCode,
      body,
    );
  }

  static notQualified(fqdn: string, statusCode: number, body: unknown): CertCenterApiError {
    return new CertCenterApiError(
      `Domain ${fqdn} is not qualified for issuance`,
      'ValidateName',
      statusCode,
      body,
    );
  }

  static orderFailed(statusCode: number, body: unknown): CertCenterApiError {
    return new CertCenterApiError('Certificate request failed', 'Order', statusCode, body);
  }
}

/**
 * The DNS TXT challenge record never appeared or does not match
 */
export class DnsVerificationError extends DvCertError {
  readonly code = 'DNS_VERIFICATION_ERROR';
  readonly type = 'dns';

  static mismatch(name: string, expected: string, observed: string[]): DnsVerificationError {
    return new DnsVerificationError(`TXT record for ${name} does NOT match the challenge value`, {
      name,
      expected,
      observed,
      reason: 'mismatch',
    });
  }

  static timeout(name: string, attempts: number, lastReason?: string): DnsVerificationError {
    return new DnsVerificationError(
      `TXT record for ${name} not found after ${attempts} attempts${lastReason ? ` (${lastReason})` : ''}`,
      { name, attempts, lastReason, reason: 'timeout' },
    );
  }
}

/**
 * Certificate files could not be written
 */
export class OutputError extends DvCertError {
  readonly code = 'OUTPUT_ERROR';
  readonly type = 'output';

  static writeFailed(path: string, reason: string): OutputError {
    return new OutputError(`Unable to write ${path}: ${reason}`, { path, reason });
  }
}

/**
 * The operator declined to continue
 */
export class CancelledError extends DvCertError {
  readonly code = 'CANCELLED';
  readonly type = 'cancelled';

  static byUser(step: string): CancelledError {
    return new CancelledError('Cancelled by user', { step });
  }
}

/**
 * Union type for all dvcert errors
 */
export type DvCertErrorType =
  | ConfigError
  | CsrError
  | AuthenticationError
  | CertCenterApiError
  | DnsVerificationError
  | OutputError
  | CancelledError;
