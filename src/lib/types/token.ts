/**
 * OAuth2 client-credentials token types
 */

import { z } from 'zod';

/** Token endpoint response (RFC 6749 section 5.1) */
export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/** On-disk token cache record */
export const AccessTokenRecordSchema = z.object({
  access_token: z.string().min(1),
  /** Expiry as whole seconds since the epoch */
  expires_at: z.number(),
  /** Token endpoint that issued the token */
  host: z.string(),
});

export type AccessTokenRecord = z.infer<typeof AccessTokenRecordSchema>;

/** Where a token handed out by the token manager came from */
export type AccessTokenSource = 'cache' | 'network';

export interface AccessToken {
  value: string;
  expiresAt: number;
  host: string;
  source: AccessTokenSource;
}
