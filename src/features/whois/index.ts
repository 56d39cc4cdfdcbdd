/**
 * WHOIS feature
 * Public API exports
 */

// Commands
export { createLookupCommand, runLookup } from './commands/lookup.js';
export type { LookupOptions, LookupOutcome } from './commands/lookup.js';
export { createHealthCommand, describeHealth, formatUptime } from './commands/health.js';
export { createToolsCommand } from './commands/tools.js';

// Runtime
export { createWhoisRuntime, loadWhoisRuntime, toConfigOverrides } from './runtime.js';
export type { WhoisRuntime, ConnectionFlags } from './runtime.js';
