/**
 * WHOIS API health command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { IWhoisApiClient } from '@whois-tools/agents';
import type { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { logger } from '@/shared/utils/logger.js';
import { loadWhoisRuntime } from '../runtime.js';

/**
 * Human-readable uptime, e.g. 3725 -> "1h 2m 5s"
 */
export function formatUptime(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = Math.floor(totalSeconds % 60);

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export async function describeHealth(client: IWhoisApiClient, baseURL: string): Promise<string[]> {
  const health = await client.health();
  const status =
    health.status === 'healthy' ? chalk.green(health.status) : chalk.yellow(health.status);

  return [
    `${chalk.bold('WHOIS API:')} ${baseURL}`,
    `${chalk.bold('Status:')} ${status}`,
    `${chalk.bold('Version:')} ${health.version}`,
    `${chalk.bold('Uptime:')} ${formatUptime(health.uptime_seconds)}`,
  ];
}

export function createHealthCommand(configLoader: ConfigLoader): Command {
  return new Command('health')
    .description('Check that the WHOIS API is reachable')
    .option('--base-url <url>', 'WHOIS API base URL')
    .option('--timeout <ms>', 'Request timeout in milliseconds')
    .action(async (options: { baseUrl?: string; timeout?: string }) => {
      const { client, config } = await loadWhoisRuntime(configLoader, options);

      try {
        const lines = await describeHealth(client, config.whoisApi.baseURL);
        console.log(lines.join('\n'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('WHOIS API health check failed', { baseURL: config.whoisApi.baseURL });
        console.error(chalk.red(`Error: ${message}`));
        process.exitCode = 1;
      }
    });
}
