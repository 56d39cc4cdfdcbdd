/**
 * Print the JSON schemas handed to the model for each registered tool
 */

import { Command } from 'commander';
import type { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { loadWhoisRuntime } from '../runtime.js';

export function createToolsCommand(configLoader: ConfigLoader): Command {
  return new Command('tools')
    .description('List tool schemas exposed to the LLM')
    .action(async () => {
      const { registry } = await loadWhoisRuntime(configLoader);
      console.log(JSON.stringify(registry.getSchemas(), null, 2));
    });
}
