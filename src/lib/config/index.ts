export { loadConfig, parseConfig, resolveValidityPeriod, CONFIG_ENV } from './config-loader.js';
export {
  ConfigFileSchema,
  CertCenterConfigSchema,
  DnsPollingConfigSchema,
  type CertCenterConfig,
  type DnsPollingConfig,
  type DvCertConfig,
} from './schema.js';
