/**
 * MockWhoisApiClient - In-memory WHOIS API client for testing
 */

import type {
  IWhoisApiClient,
  WhoisHealth,
  WhoisLookupOptions,
  WhoisLookupResult,
} from '../../src/whois/types.js';
import { WhoisRecordSchema } from '../../src/whois/types.js';

export class MockWhoisApiClient implements IWhoisApiClient {
  private records = new Map<string, Record<string, unknown>>();
  private failures = new Map<string, Error>();
  readonly calls: Array<{ domain: string; options?: WhoisLookupOptions }> = [];

  setRecord(domain: string, payload: Record<string, unknown>): void {
    this.records.set(domain, payload);
  }

  setFailure(domain: string, error: Error): void {
    this.failures.set(domain, error);
  }

  async lookup(domain: string, options?: WhoisLookupOptions): Promise<WhoisLookupResult> {
    this.calls.push({ domain, options });

    const failure = this.failures.get(domain);
    if (failure) {
      throw failure;
    }

    const payload = this.records.get(domain);
    if (!payload) {
      throw new Error(`No mock record for ${domain}`);
    }

    return { domain, record: WhoisRecordSchema.parse(payload), payload };
  }

  async health(): Promise<WhoisHealth> {
    return { status: 'healthy', version: 'mock', uptime_seconds: 0 };
  }
}
