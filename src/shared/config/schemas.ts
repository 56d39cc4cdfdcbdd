/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';
import { DEFAULT_WHOIS_API_BASE, DEFAULT_WHOIS_TIMEOUT_MS } from '@whois-tools/agents';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * WHOIS lookup service connection
 */
export const WhoisApiConfigSchema = z.object({
  baseURL: z.string().url().default(DEFAULT_WHOIS_API_BASE),
  timeoutMs: z.number().int().positive().default(DEFAULT_WHOIS_TIMEOUT_MS),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  fileLogging: z.boolean().default(false), // Daily-rotated files under logDir
  logDir: z.string().default('.whois-tools/logs'),
});

export const ConfigSchema = z.object({
  whoisApi: WhoisApiConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

/**
 * Shape of config.yml files and other partial overrides
 */
export const ConfigOverridesSchema = z.object({
  whoisApi: WhoisApiConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type WhoisApiConfig = z.infer<typeof WhoisApiConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;
