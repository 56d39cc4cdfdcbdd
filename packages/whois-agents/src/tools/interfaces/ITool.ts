/**
 * ITool - contract between the registry and a tool implementation
 */

import type { ToolDefinition, ToolResult, ToolValidationResult } from '../types.js';

export interface ITool {
  readonly definition: ToolDefinition;

  /**
   * Run the tool. Failures come back as `{ success: false }`, never as a rejection.
   */
  execute(args: Record<string, unknown>): Promise<ToolResult>;

  validate(args: Record<string, unknown>): ToolValidationResult;

  /**
   * JSON schema handed to the model
   */
  getSchema(): Record<string, unknown>;
}
