/**
 * Configuration loader with hierarchy support
 * Priority: CLI flags > env vars > project config > global config > defaults
 */

import yaml from 'yaml';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { ConfigurationError } from '@whois-tools/agents';
import {
  ConfigOverridesSchema,
  ConfigSchema,
  type Config,
  type ConfigOverrides,
} from './schemas.js';
import type { IFileSystem } from '@/platform/IFileSystem.js';
import { logger } from '@/shared/utils/logger.js';

export const CONFIG_DIR_NAME = '.whois-tools';
export const CONFIG_FILE_NAME = 'config.yml';

export interface ConfigLoadOptions {
  projectRoot?: string;
  cliFlags?: ConfigOverrides;
}

export interface ConfigLoaderOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export class ConfigLoader {
  private env: NodeJS.ProcessEnv;
  private homeDir: string;

  constructor(
    private fs: IFileSystem,
    options: ConfigLoaderOptions = {}
  ) {
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDir ?? os.homedir();
  }

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.whois-tools/config.yml)
   * 3. Project (.whois-tools/config.yml)
   * 4. Environment variables (.env)
   * 5. CLI flags
   */
  async load(options: ConfigLoadOptions = {}): Promise<Config> {
    const layers: Array<ConfigOverrides | null> = [
      await this.loadConfigFile(path.join(this.homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME)),
      options.projectRoot
        ? await this.loadConfigFile(path.join(options.projectRoot, CONFIG_DIR_NAME, CONFIG_FILE_NAME))
        : null,
      await this.loadEnvConfig(options.projectRoot),
      options.cliFlags ?? null,
    ];

    let config: ConfigOverrides = {};
    for (const layer of layers) {
      if (layer) {
        config = this.merge(config, layer);
      }
    }

    return this.validate(config);
  }

  validate(config: unknown): Config {
    try {
      return ConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
      }
      throw error;
    }
  }

  private async loadConfigFile(configPath: string): Promise<ConfigOverrides | null> {
    try {
      if (!(await this.fs.exists(configPath))) {
        return null;
      }
      const content = await this.fs.readFile(configPath);
      const parsed = ConfigOverridesSchema.safeParse(yaml.parse(content) ?? {});
      if (!parsed.success) {
        logger.warn('Ignoring invalid config file', {
          path: configPath,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('Failed to load config file', {
        path: configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Read .env from project root if provided, otherwise cwd.
   * Variables already set in the environment win over the file.
   */
  private async loadDotenv(projectRoot?: string): Promise<Record<string, string>> {
    const envPath = projectRoot ? path.join(projectRoot, '.env') : '.env';
    try {
      if (!(await this.fs.exists(envPath))) {
        return {};
      }
      return dotenv.parse(await this.fs.readFile(envPath));
    } catch (error) {
      logger.warn('Failed to load .env file', {
        path: envPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private async loadEnvConfig(projectRoot?: string): Promise<ConfigOverrides | null> {
    const env: NodeJS.ProcessEnv = { ...(await this.loadDotenv(projectRoot)), ...this.env };
    const envConfig: ConfigOverrides = {};

    const baseURL = env.WHOIS_API_BASE;
    const timeout = env.WHOIS_API_TIMEOUT_MS;
    if (baseURL || timeout) {
      envConfig.whoisApi = {};
      if (baseURL) envConfig.whoisApi.baseURL = baseURL;
      if (timeout) envConfig.whoisApi.timeoutMs = Number(timeout);
    }

    const level = env.LOG_LEVEL;
    if (level) {
      const parsed = ConfigOverridesSchema.shape.logging.safeParse({ level });
      if (parsed.success) {
        envConfig.logging = parsed.data;
      } else {
        logger.warn('Ignoring invalid LOG_LEVEL', { level });
      }
    }

    return Object.keys(envConfig).length > 0 ? envConfig : null;
  }

  private merge(base: ConfigOverrides, override: ConfigOverrides): ConfigOverrides {
    return {
      whoisApi: { ...base.whoisApi, ...override.whoisApi },
      logging: { ...base.logging, ...override.logging },
    };
  }
}
