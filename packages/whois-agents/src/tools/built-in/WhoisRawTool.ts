/**
 * WhoisRawTool - Unprocessed WHOIS record for the model to analyse
 */

import { z } from 'zod';
import { BaseTool } from '../BaseTool.js';
import type { ToolResult } from '../types.js';
import type { IWhoisApiClient } from '../../whois/types.js';
import { formatLookupError, formatRawWhois, normalizeDomain } from '../../whois/formatters.js';
import { toolResultToText } from '../toolResultToText.js';

const WhoisRawArgsSchema = z.object({
  domain: z.string().describe('Domain name to lookup'),
  fresh: z.boolean().optional().describe('Bypass the lookup service cache'),
});

export class WhoisRawTool extends BaseTool {
  constructor(private readonly client: IWhoisApiClient) {
    super({
      name: 'whois_raw',
      description: 'Get raw WHOIS information for a domain for the LLM to analyze.',
      parameters: WhoisRawArgsSchema,
      enabled: true,
    });
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = WhoisRawArgsSchema.safeParse(args);
    if (!parsed.success) {
      return this.error(`Error: ${parsed.error.issues[0]?.message ?? 'Invalid arguments'}`);
    }
    const domain = normalizeDomain(parsed.data.domain);

    try {
      const result = await this.client.lookup(domain, { fresh: parsed.data.fresh });
      return this.success(formatRawWhois(domain, result), {
        domain,
        rawLength: result.record.raw_data?.length ?? 0,
      });
    } catch (error) {
      return this.error(formatLookupError(domain, error, { includeStatus: false }), { domain });
    }
  }

  async lookup(domain: string): Promise<string> {
    return toolResultToText(await this.execute({ domain }));
  }
}
