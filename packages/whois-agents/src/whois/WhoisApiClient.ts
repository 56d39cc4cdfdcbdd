/**
 * HTTP client for the WHOIS lookup microservice, built on axios.
 * Maps transport and status failures to the package error types.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  NetworkError,
  WhoisResponseError,
  WhoisStatusError,
} from '../shared/utils/errors.js';
import { noopLogger, type ILogger } from '../shared/logging/ILogger.js';
import {
  WhoisErrorBodySchema,
  WhoisHealthSchema,
  WhoisRecordSchema,
  type IWhoisApiClient,
  type WhoisHealth,
  type WhoisLookupOptions,
  type WhoisLookupResult,
} from './types.js';

export const DEFAULT_WHOIS_API_BASE = 'http://localhost:3001';
export const DEFAULT_WHOIS_TIMEOUT_MS = 30000;

export interface WhoisApiClientConfig {
  baseURL: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: ILogger;
}

export class WhoisApiClient implements IWhoisApiClient {
  private axiosInstance: AxiosInstance;
  private logger: ILogger;

  constructor(private readonly config: WhoisApiClientConfig) {
    this.axiosInstance = axios.create({
      baseURL: config.baseURL,
      headers: { Accept: 'application/json', ...config.headers },
      timeout: config.timeoutMs ?? DEFAULT_WHOIS_TIMEOUT_MS,
      // Anything but 200 is a failed lookup
      validateStatus: (status) => status === 200,
    });
    this.logger = config.logger ?? noopLogger;
  }

  get baseURL(): string {
    return this.config.baseURL;
  }

  /**
   * Look up a domain
   *
   * Path routes never bypass the service cache, so fresh lookups go through
   * the query-string routes instead.
   */
  async lookup(domain: string, options: WhoisLookupOptions = {}): Promise<WhoisLookupResult> {
    const route = options.debug ? '/whois/debug' : '/whois';
    const request: { url: string; params?: Record<string, string | boolean> } = options.fresh
      ? { url: route, params: { domain, fresh: true } }
      : { url: `${route}/${encodeURIComponent(domain)}` };

    this.logger.debug('WHOIS lookup', { domain, ...request });

    let payload: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>(request.url, {
        params: request.params,
      });
      payload = response.data;
    } catch (error) {
      throw this.mapError(error, domain);
    }

    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      this.logger.warn('WHOIS API returned a non-object body', { domain });
      throw new WhoisResponseError('WHOIS API returned a non-object response body');
    }

    // Field schemas fall back to undefined, so only the object check can fail
    return { domain, record: WhoisRecordSchema.parse(payload), payload };
  }

  async health(): Promise<WhoisHealth> {
    let payload: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>('/health');
      payload = response.data;
    } catch (error) {
      throw this.mapError(error);
    }

    const parsed = WhoisHealthSchema.safeParse(payload);
    if (!parsed.success) {
      throw new WhoisResponseError('Invalid health response from WHOIS API');
    }
    return parsed.data;
  }

  /**
   * Map axios errors to custom error types
   */
  private mapError(error: unknown, domain?: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const status = error.response?.status;
    if (status !== undefined) {
      const body = WhoisErrorBodySchema.safeParse(error.response?.data);
      const serverMessage = body.success ? body.data.error : undefined;
      this.logger.warn('WHOIS API returned an error status', { domain, status, serverMessage });
      return new WhoisStatusError(domain ?? this.config.baseURL, status, serverMessage);
    }

    this.logger.warn('WHOIS API request failed', { domain, code: error.code, message: error.message });

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(`WHOIS API request timeout: ${error.message}`);
    }

    return new NetworkError(`WHOIS API request failed: ${error.message}`);
  }
}
