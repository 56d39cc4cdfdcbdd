/**
 * WHOIS lookup command
 *
 * whois-tools lookup <domain> [--raw] [--fresh] [--debug]
 */

import { Command } from 'commander';
import ora from 'ora';
import type { ToolRegistry } from '@whois-tools/agents';
import type { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { loadWhoisRuntime } from '../runtime.js';

export interface LookupOptions {
  raw?: boolean;
  fresh?: boolean;
  debug?: boolean;
}

export interface LookupOutcome {
  text: string;
  isError: boolean;
}

/**
 * Run the whois (or whois_raw) tool exactly as an LLM framework would
 */
export async function runLookup(
  registry: ToolRegistry,
  domain: string,
  options: LookupOptions = {}
): Promise<LookupOutcome> {
  const toolName = options.raw ? 'whois_raw' : 'whois';
  const args: Record<string, unknown> = { domain };
  if (options.fresh) args.fresh = true;
  if (options.debug && !options.raw) args.debug = true;

  const text = await registry.executeAsText(toolName, args);
  return { text, isError: text.startsWith('Error: ') };
}

export function createLookupCommand(configLoader: ConfigLoader): Command {
  return new Command('lookup')
    .description('Look up WHOIS information for a domain')
    .argument('<domain>', 'Domain name to lookup')
    .option('--raw', 'Print the unprocessed WHOIS record')
    .option('--fresh', 'Bypass the lookup service cache')
    .option('--debug', 'Include the parser analysis (ignored with --raw)')
    .option('--base-url <url>', 'WHOIS API base URL')
    .option('--timeout <ms>', 'Request timeout in milliseconds')
    .action(
      async (
        domain: string,
        options: LookupOptions & { baseUrl?: string; timeout?: string }
      ) => {
        const { registry } = await loadWhoisRuntime(configLoader, options);

        const spinner = ora({ text: `Looking up ${domain}...`, stream: process.stderr }).start();
        const outcome = await runLookup(registry, domain, options);
        spinner.stop();

        process.stdout.write(`${outcome.text}\n`);
        if (outcome.isError) {
          process.exitCode = 1;
        }
      }
    );
}
