/**
 * End-to-end tests for the lookup command against an in-process WHOIS API
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { runLookup } from '@/features/whois/commands/lookup.js';
import { createWhoisRuntime, toConfigOverrides } from '@/features/whois/runtime.js';
import { ConfigSchema } from '@/shared/config/schemas.js';

const BASE_URL = 'http://whois-api.test';

const FULL_RECORD = {
  domain: 'example-test.com',
  whois_server: 'whois.registrar.test',
  raw_data: 'Domain Name: EXAMPLE-TEST.COM\nRegistrar: Test Registrar LLC',
  parsed_data: {
    registrar: 'Test Registrar LLC',
    creation_date: '2001-05-20T04:00:00Z',
    expiration_date: '2030-05-20T04:00:00Z',
    updated_date: '2024-03-01T10:00:00Z',
    name_servers: ['ns1.example-test.com'],
    status: ['ok'],
    registrant_name: null,
    registrant_email: null,
    admin_email: null,
    tech_email: null,
    created_ago: 8500,
    updated_ago: 200,
    expires_in: 1300,
  },
  cached: false,
  query_time_ms: 12,
};

// MSW server setup
const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

function createRegistry() {
  const config = ConfigSchema.parse({ whoisApi: { baseURL: BASE_URL } });
  return createWhoisRuntime(config).registry;
}

describe('runLookup', () => {
  it('should print the verbose summary for a successful lookup', async () => {
    server.use(http.get(`${BASE_URL}/whois/:domain`, () => HttpResponse.json(FULL_RECORD)));

    const outcome = await runLookup(createRegistry(), 'Example-Test.com');

    expect(outcome.isError).toBe(false);
    expect(outcome.text).toContain('WHOIS Information for example-test.com:\n');
    expect(outcome.text).toContain('  Registrar: Test Registrar LLC\n');
    expect(outcome.text).toContain('  Registrant Email: Not available\n');
    expect(outcome.text).toContain('Raw WHOIS Data Available: Yes (59 characters)\n');
    expect(outcome.text.endsWith(`--- Full API Response ---\n${JSON.stringify(FULL_RECORD, null, 2)}`)).toBe(
      true
    );
  });

  it('should print the raw record with --raw', async () => {
    server.use(http.get(`${BASE_URL}/whois/:domain`, () => HttpResponse.json(FULL_RECORD)));

    const outcome = await runLookup(createRegistry(), 'example-test.com', { raw: true });

    expect(outcome).toEqual({
      text: 'Raw WHOIS data for example-test.com:\n\nDomain Name: EXAMPLE-TEST.COM\nRegistrar: Test Registrar LLC',
      isError: false,
    });
  });

  it('should explain an empty raw record', async () => {
    server.use(
      http.get(`${BASE_URL}/whois/:domain`, () =>
        HttpResponse.json({ domain: 'example-test.com', raw_data: '' })
      )
    );

    const outcome = await runLookup(createRegistry(), 'example-test.com', { raw: true });

    expect(outcome.text).toBe(
      'No WHOIS data available for example-test.com. This may be due to privacy protection or server restrictions.'
    );
  });

  it('should report a non-200 status', async () => {
    server.use(
      http.get(`${BASE_URL}/whois/:domain`, () =>
        HttpResponse.json({ error: 'Internal server error', status: 500 }, { status: 500 })
      )
    );
    const registry = createRegistry();

    expect(await runLookup(registry, 'example-test.com')).toEqual({
      text: 'Error: Failed to get WHOIS data for example-test.com (Status: 500)',
      isError: true,
    });
    expect(await runLookup(registry, 'example-test.com', { raw: true })).toEqual({
      text: 'Error: Failed to get WHOIS data for example-test.com',
      isError: true,
    });
  });

  it('should report a malformed body as an error message', async () => {
    server.use(http.get(`${BASE_URL}/whois/:domain`, () => HttpResponse.json('not an object')));

    expect(await runLookup(createRegistry(), 'example-test.com')).toEqual({
      text: 'Error: WHOIS API returned a non-object response body',
      isError: true,
    });
  });

  it('should send fresh and debug lookups to the query route', async () => {
    let seenUrl = '';
    server.use(
      http.get(`${BASE_URL}/whois/debug`, ({ request }) => {
        seenUrl = request.url;
        return HttpResponse.json({ ...FULL_RECORD, parsing_analysis: ['matched registrar'] });
      })
    );

    const outcome = await runLookup(createRegistry(), 'example-test.com', {
      fresh: true,
      debug: true,
    });

    expect(seenUrl).toBe(`${BASE_URL}/whois/debug?domain=example-test.com&fresh=true`);
    expect(outcome.text).toContain('\nParsing Analysis:\n  - matched registrar\n');
  });
});

describe('toConfigOverrides', () => {
  it('should leave out unset flags', () => {
    expect(toConfigOverrides({})).toEqual({});
    expect(toConfigOverrides({ baseUrl: 'http://cli.test' })).toEqual({
      whoisApi: { baseURL: 'http://cli.test' },
    });
  });

  it('should convert the timeout to a number', () => {
    expect(toConfigOverrides({ timeout: '2500' })).toEqual({ whoisApi: { timeoutMs: 2500 } });
  });
});
