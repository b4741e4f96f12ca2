import type { z } from 'zod';
import { AuthenticationError, CertCenterApiError } from '../errors/errors.js';
import type { CertCenterHttpClient, ParsedResponse } from '../transport/http-client.js';
import {
  DnsDataResponseSchema,
  OrderFulfillmentResponseSchema,
  OrderResponseSchema,
  ValidateNameResponseSchema,
  type CertificateResult,
  type DnsChallenge,
  type OrderParameters,
  type ValidateNameResponse,
} from '../types/certcenter.js';
import { debugMain } from '../utils/debug.js';

export interface CertCenterClientOptions {
  /** Base URL of the REST API, e.g. https://api.certcenter.com/rest/v1 */
  apiBaseUrl: string;
  /** CertCenter product code, e.g. AlwaysOnSSL.AlwaysOnSSL */
  productCode: string;
}

export type CertCenterOperation = 'ValidateName' | 'DNSData' | 'Order';

/**
 * Client for the three CertCenter REST calls used by DNS-validated issuance
 */
export class CertCenterClient {
  constructor(
    private readonly http: CertCenterHttpClient,
    private readonly options: CertCenterClientOptions,
  ) {}

  /** Check that `fqdn` qualifies for the configured product. */
  async validateName(token: string, fqdn: string): Promise<ValidateNameResponse> {
    const res = await this.call('ValidateName', token, { CommonName: fqdn });
    const body = this.parse('ValidateName', ValidateNameResponseSchema, res);

    if (!body.success) {
      throw AuthenticationError.authorizationFailed('ValidateName', res.body);
    }
    if (body.IsQualified !== true) {
      throw CertCenterApiError.notQualified(fqdn, res.statusCode, res.body);
    }
    return body;
  }

  /** Fetch the TXT value that proves control of the CSR's common name. */
  async getDnsData(token: string, csr: string): Promise<DnsChallenge> {
    const res = await this.call('DNSData', token, {
      CSR: csr,
      ProductCode: this.options.productCode,
    });
    const body = this.parse('DNSData', DnsDataResponseSchema, res);

    return {
      value: body.DNSAuthDetails.DNSValue,
      example: body.DNSAuthDetails.Example,
    };
  }

  /** Place a DNS-validated order and return the issued certificate. */
  async requestCertificate(
    token: string,
    csr: string,
    validityPeriod: number,
  ): Promise<CertificateResult> {
    const orderParameters: OrderParameters = {
      ProductCode: this.options.productCode,
      CSR: csr,
      ValidityPeriod: validityPeriod,
      DVAuthMethod: 'DNS',
    };
    const res = await this.call('Order', token, { OrderParameters: orderParameters });
    const status = this.parse('Order', OrderResponseSchema, res);

    if (!status.success) {
      throw CertCenterApiError.orderFailed(res.statusCode, res.body);
    }

    const { Fulfillment } = this.parse('Order', OrderFulfillmentResponseSchema, res);
    return {
      certificate: Fulfillment.Certificate,
      intermediate: Fulfillment.Intermediate,
      pkcs7: Fulfillment.Certificate_PKCS7,
      expiration: Fulfillment.EndDate,
      ...(status.OrderID !== undefined && { orderId: String(status.OrderID) }),
    };
  }

  private async call(
    operation: CertCenterOperation,
    token: string,
    payload: unknown,
  ): Promise<ParsedResponse> {
    const url = `${this.options.apiBaseUrl.replace(/\/+$/, '')}/${operation}`;
    debugMain('%s -> %s', operation, url);
    const res = await this.http.postJson(url, payload, { bearer: token });
    if (res.statusCode === 401) {
      throw AuthenticationError.authorizationFailed(operation, res.body);
    }
    return res;
  }

  private parse<S extends z.ZodTypeAny>(
    operation: CertCenterOperation,
    schema: S,
    res: ParsedResponse,
  ): z.infer<S> {
    const result = schema.safeParse(res.body);
    if (result.success) return result.data;

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw CertCenterApiError.httpStatus(operation, res.statusCode, res.body);
    }
    throw CertCenterApiError.unexpectedResponse(
      operation,
      res.statusCode,
      res.body,
      result.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`),
    );
  }
}
