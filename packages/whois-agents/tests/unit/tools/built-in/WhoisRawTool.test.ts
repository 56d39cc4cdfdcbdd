/**
 * Tests for WhoisRawTool
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { WhoisRawTool } from '../../../../src/tools/built-in/WhoisRawTool.js';
import { WhoisStatusError } from '../../../../src/shared/utils/errors.js';
import { MockWhoisApiClient } from '../../../mocks/MockWhoisApiClient.js';
import {
  RAW_WHOIS_TEXT,
  WHOIS_FULL_RESPONSE,
  WHOIS_UNPARSED_RESPONSE,
} from '../../../fixtures/whois-responses.js';

describe('WhoisRawTool', () => {
  let client: MockWhoisApiClient;
  let tool: WhoisRawTool;

  beforeEach(() => {
    client = new MockWhoisApiClient();
    tool = new WhoisRawTool(client);
  });

  it('should be registered as whois_raw', () => {
    expect(tool.definition.name).toBe('whois_raw');
    expect(tool.definition.enabled).toBe(true);
  });

  it('should return the raw record', async () => {
    client.setRecord('example-test.com', WHOIS_FULL_RESPONSE);

    const result = await tool.execute({ domain: 'example-test.com' });

    expect(result).toEqual({
      success: true,
      output: `Raw WHOIS data for example-test.com:\n\n${RAW_WHOIS_TEXT}`,
      metadata: { domain: 'example-test.com', rawLength: RAW_WHOIS_TEXT.length },
    });
  });

  it('should explain an empty raw record', async () => {
    client.setRecord('example-test.org', WHOIS_UNPARSED_RESPONSE);

    expect(await tool.lookup('example-test.org')).toBe(
      'No WHOIS data available for example-test.org. This may be due to privacy protection or server restrictions.'
    );
  });

  it('should report non-200 responses without the status', async () => {
    client.setFailure('example-test.com', new WhoisStatusError('example-test.com', 500));

    expect(await tool.lookup('example-test.com')).toBe(
      'Error: Failed to get WHOIS data for example-test.com'
    );
  });

  it('should report thrown errors by message', async () => {
    client.setFailure('example-test.com', new Error('socket hang up'));

    expect(await tool.lookup('example-test.com')).toBe('Error: socket hang up');
  });

  it('should forward fresh to the client', async () => {
    client.setRecord('example-test.com', WHOIS_FULL_RESPONSE);

    await tool.execute({ domain: 'Example-Test.com', fresh: true });

    expect(client.calls).toEqual([{ domain: 'example-test.com', options: { fresh: true } }]);
  });
});
