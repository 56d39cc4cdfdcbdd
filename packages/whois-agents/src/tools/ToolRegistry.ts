/**
 * ToolRegistry - name-indexed tools the model may call
 */

import type { ITool } from './interfaces/ITool.js';
import type { ToolResult } from './types.js';
import { toolResultToText } from './toolResultToText.js';

export class ToolRegistry {
  private readonly tools = new Map<string, ITool>();

  register(tool: ITool): void {
    const { name } = tool.definition;
    if (this.tools.has(name)) {
      throw new Error(`Tool '${name}' is already registered`);
    }
    this.tools.set(name, tool);
  }

  listEnabled(): ITool[] {
    return [...this.tools.values()].filter((tool) => tool.definition.enabled);
  }

  /**
   * Schemas of the enabled tools, in registration order
   */
  getSchemas(): Record<string, unknown>[] {
    return this.listEnabled().map((tool) => tool.getSchema());
  }

  /**
   * Validate the arguments and run the named tool, timing the call
   */
  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return { success: false, error: `Tool '${toolName}' not found` };
    }
    if (!tool.definition.enabled) {
      return { success: false, error: `Tool '${toolName}' is disabled` };
    }

    const validation = tool.validate(args);
    if (!validation.success) {
      return { success: false, error: `Invalid arguments: ${validation.error}` };
    }

    const startTime = Date.now();
    try {
      const result = await tool.execute(validation.data ?? args);
      return {
        ...result,
        metadata: { ...result.metadata, executionTime: Date.now() - startTime },
      };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Execute and flatten the result to the text handed back to the model
   */
  async executeAsText(toolName: string, args: Record<string, unknown>): Promise<string> {
    return toolResultToText(await this.execute(toolName, args));
  }
}
