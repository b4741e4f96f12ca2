/**
 * dvcert Library - Core Exports
 *
 * DNS-validated certificate issuance against the CertCenter REST API
 */

// Pipeline
export {
  issueCertificate,
  ISSUANCE_STEPS,
  type IssuanceStep,
  type IssuanceRequest,
  type IssuanceDependencies,
  type IssuanceHooks,
  type IssuanceResult,
} from './core/issuance.js';
export {
  TokenManager,
  type TokenManagerOptions,
  type AccessTokenProvider,
} from './core/token-manager.js';
export {
  CertCenterClient,
  type CertCenterClientOptions,
  type CertCenterOperation,
} from './core/certcenter-client.js';
export {
  writeCertificateFiles,
  certificateFilePaths,
  type CertificateFiles,
} from './core/certificate-writer.js';
export { readCsrFile } from './core/csr.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  resolveValidityPeriod,
  CONFIG_ENV,
  type CertCenterConfig,
  type DnsPollingConfig,
  type DvCertConfig,
} from './config/index.js';

// Error handling
export {
  DvCertError,
  ConfigError,
  CsrError,
  AuthenticationError,
  CertCenterApiError,
  DnsVerificationError,
  OutputError,
  CancelledError,
  type DvCertErrorType,
} from './errors/errors.js';

// Types
export type {
  AccessToken,
  AccessTokenRecord,
  AccessTokenSource,
  TokenResponse,
} from './types/token.js';
export type {
  CertificateResult,
  DnsChallenge,
  OrderParameters,
  ValidateNameResponse,
} from './types/certcenter.js';

// DNS challenge verification
export {
  normalizeTxtFragments,
  validateTxtSet,
  createPinnedResolver,
  waitForTxtRecord,
  type TxtResolver,
  type TxtValidationResult,
  type PropagationAttempt,
  type PropagationOptions,
} from './challenges/index.js';

// Transport layer
export {
  CertCenterHttpClient,
  type CertCenterHttpClientOptions,
  type ParsedResponse,
} from './transport/http-client.js';

// Utils
export { sleep } from './utils/index.js';
export { enableVerbose } from './utils/debug.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './utils/user-agent.js';
