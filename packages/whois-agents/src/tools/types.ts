/**
 * Tool system types
 */

import type { z } from 'zod';

/**
 * Tool execution result
 */
export interface ToolResult {
  success: boolean;
  output?: unknown;
  error?: string;
  metadata?: {
    executionTime?: number;
    [key: string]: unknown;
  };
}

/**
 * Flat zod object describing a tool's arguments
 */
export type ToolParameterSchema = z.AnyZodObject;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  /** Disabled tools are hidden from the model and refuse to run */
  enabled: boolean;
}

export interface ToolValidationResult {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
}
