/**
 * Wires configuration, logging, the WHOIS API client and the tool registry
 */

import {
  ToolRegistry,
  WhoisApiClient,
  registerWhoisTools,
  type IWhoisApiClient,
} from '@whois-tools/agents';
import type { Config, ConfigOverrides } from '@/shared/config/schemas.js';
import type { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { logger } from '@/shared/utils/logger.js';

export interface WhoisRuntime {
  config: Config;
  client: IWhoisApiClient;
  registry: ToolRegistry;
}

export interface ConnectionFlags {
  baseUrl?: string;
  timeout?: string;
}

/**
 * Translate commander flags into config overrides, leaving out unset values
 */
export function toConfigOverrides(flags: ConnectionFlags): ConfigOverrides {
  if (flags.baseUrl === undefined && flags.timeout === undefined) {
    return {};
  }
  return {
    whoisApi: {
      ...(flags.baseUrl !== undefined && { baseURL: flags.baseUrl }),
      ...(flags.timeout !== undefined && { timeoutMs: Number(flags.timeout) }),
    },
  };
}

export function createWhoisRuntime(config: Config, client?: IWhoisApiClient): WhoisRuntime {
  const apiClient =
    client ??
    new WhoisApiClient({
      baseURL: config.whoisApi.baseURL,
      timeoutMs: config.whoisApi.timeoutMs,
      logger,
    });

  return {
    config,
    client: apiClient,
    registry: registerWhoisTools(new ToolRegistry(), apiClient),
  };
}

export async function loadWhoisRuntime(
  configLoader: ConfigLoader,
  flags: ConnectionFlags = {}
): Promise<WhoisRuntime> {
  const config = await configLoader.load({
    projectRoot: process.cwd(),
    cliFlags: toConfigOverrides(flags),
  });
  logger.configure(config.logging);
  logger.debug('Configuration loaded', { whoisApi: config.whoisApi });

  return createWhoisRuntime(config);
}
