// Main entry point - re-export all modules

// Tool exports
export {
  BaseTool,
  ToolRegistry,
  WhoisTool,
  WhoisRawTool,
  createWhoisTools,
  registerWhoisTools,
  toolResultToText,
} from './tools/index.js';
export type {
  ITool,
  ToolResult,
  ToolDefinition,
  ToolParameterSchema,
  ToolValidationResult,
} from './tools/index.js';

// WHOIS API exports
export * from './whois/index.js';

// Shared
export * from './shared/utils/errors.js';
export { noopLogger } from './shared/logging/ILogger.js';
export type { ILogger } from './shared/logging/ILogger.js';
