/**
 * dvcert - DNS-validated certificate issuance for CertCenter
 *
 * Main entry point for the library
 */

export * from './lib/index.js';
