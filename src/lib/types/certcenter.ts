/**
 * CertCenter REST API request and response types
 *
 * Responses are validated with zod at the boundary; unknown keys pass through
 * so the raw body can still be shown on failure.
 */

import { z } from 'zod';

export const ValidateNameResponseSchema = z
  .object({
    success: z.boolean(),
    IsQualified: z.boolean().optional(),
  })
  .passthrough();

export type ValidateNameResponse = z.infer<typeof ValidateNameResponseSchema>;

export const DnsDataResponseSchema = z
  .object({
    success: z.boolean().optional(),
    DNSAuthDetails: z
      .object({
        DNSValue: z.string().min(1),
        DNSEntry: z.string().optional(),
        Example: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type DnsDataResponse = z.infer<typeof DnsDataResponseSchema>;

export const OrderResponseSchema = z
  .object({
    success: z.boolean(),
    OrderID: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

export const FulfillmentSchema = z
  .object({
    Certificate: z.string().min(1),
    Intermediate: z.string(),
    Certificate_PKCS7: z.string(),
    EndDate: z.string(),
  })
  .passthrough();

export const OrderFulfillmentResponseSchema = z
  .object({
    Fulfillment: FulfillmentSchema,
  })
  .passthrough();

/** DNS challenge handed out for a CSR */
export interface DnsChallenge {
  /** TXT value the record must carry */
  value: string;
  /** Suggested zone file line, when CertCenter returns one */
  example?: string;
}

/** Certificate issued by an Order call */
export interface CertificateResult {
  certificate: string;
  intermediate: string;
  pkcs7: string;
  expiration: string;
  orderId?: string;
}

/** Parameters of an Order call */
export interface OrderParameters {
  ProductCode: string;
  CSR: string;
  ValidityPeriod: number;
  DVAuthMethod: 'DNS';
}
