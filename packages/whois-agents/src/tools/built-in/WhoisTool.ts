/**
 * WhoisTool - Verbose WHOIS lookup with parsed summary and full JSON dump
 */

import { z } from 'zod';
import { BaseTool } from '../BaseTool.js';
import type { ToolResult } from '../types.js';
import type { IWhoisApiClient } from '../../whois/types.js';
import { formatLookupError, formatWhoisSummary, normalizeDomain } from '../../whois/formatters.js';
import { toolResultToText } from '../toolResultToText.js';

const WhoisArgsSchema = z.object({
  domain: z.string().describe('Domain name to lookup'),
  fresh: z.boolean().optional().describe('Bypass the lookup service cache'),
  debug: z.boolean().optional().describe('Include the parser analysis in the output'),
});

export class WhoisTool extends BaseTool {
  constructor(private readonly client: IWhoisApiClient) {
    super({
      name: 'whois',
      description: 'Get WHOIS information for a domain.',
      parameters: WhoisArgsSchema,
      enabled: true,
    });
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = WhoisArgsSchema.safeParse(args);
    if (!parsed.success) {
      return this.error(`Error: ${parsed.error.issues[0]?.message ?? 'Invalid arguments'}`);
    }
    const { fresh, debug } = parsed.data;
    const domain = normalizeDomain(parsed.data.domain);

    try {
      const result = await this.client.lookup(domain, { fresh, debug });
      return this.success(formatWhoisSummary(domain, result), {
        domain,
        cached: result.record.cached ?? false,
      });
    } catch (error) {
      return this.error(formatLookupError(domain, error, { includeStatus: true }), { domain });
    }
  }

  /**
   * Run a lookup and return the text handed to the model
   */
  async lookup(domain: string): Promise<string> {
    return toolResultToText(await this.execute({ domain }));
  }
}
