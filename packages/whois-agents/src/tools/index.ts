// Tools exports

import { ToolRegistry } from './ToolRegistry.js';
import { WhoisTool } from './built-in/WhoisTool.js';
import { WhoisRawTool } from './built-in/WhoisRawTool.js';
import type { ITool } from './interfaces/ITool.js';
import type { IWhoisApiClient } from '../whois/types.js';

// Types
export * from './types.js';

// Interfaces
export type { ITool } from './interfaces/ITool.js';

// Base classes
export { BaseTool } from './BaseTool.js';

// Registry
export { ToolRegistry } from './ToolRegistry.js';
export { toolResultToText } from './toolResultToText.js';

// Built-in tools
export { WhoisTool } from './built-in/WhoisTool.js';
export { WhoisRawTool } from './built-in/WhoisRawTool.js';

export function createWhoisTools(client: IWhoisApiClient): ITool[] {
  return [new WhoisTool(client), new WhoisRawTool(client)];
}

export function registerWhoisTools(
  registry: ToolRegistry,
  client: IWhoisApiClient
): ToolRegistry {
  for (const tool of createWhoisTools(client)) {
    registry.register(tool);
  }
  return registry;
}
