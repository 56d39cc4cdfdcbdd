/**
 * BaseTool - Abstract base class for tool implementations
 */

import { z } from 'zod';
import type { ITool } from './interfaces/ITool.js';
import type { ToolDefinition, ToolResult, ToolValidationResult } from './types.js';

/**
 * Base tool class providing common functionality
 */
export abstract class BaseTool implements ITool {
  constructor(public readonly definition: ToolDefinition) {}

  /**
   * Execute the tool - must be implemented by subclasses
   */
  abstract execute(args: Record<string, unknown>): Promise<ToolResult>;

  /**
   * Validate arguments against schema
   */
  validate(args: Record<string, unknown>): ToolValidationResult {
    const parsed = this.definition.parameters.safeParse(args);
    if (parsed.success) {
      return { success: true, data: parsed.data };
    }

    return {
      success: false,
      error: parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`)
        .join('; '),
    };
  }

  /**
   * Get JSON schema for LLM
   */
  getSchema(): Record<string, unknown> {
    return {
      name: this.definition.name,
      description: this.definition.description,
      parameters: this.zodToJsonSchema(this.definition.parameters),
    };
  }

  /**
   * Convert the parameter object to JSON Schema (flat objects only)
   */
  private zodToJsonSchema(schema: z.AnyZodObject): Record<string, unknown> {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = {
        type: this.getJsonType(field),
        description: field.description ?? '',
      };

      if (!field.isOptional()) {
        required.push(key);
      }
    }

    return {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  }

  /**
   * Get JSON type from Zod type
   */
  private getJsonType(field: z.ZodTypeAny): string {
    let inner = field;
    while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
      inner = inner.unwrap();
    }
    if (inner instanceof z.ZodDefault) {
      inner = inner.removeDefault();
    }

    if (inner instanceof z.ZodString) return 'string';
    if (inner instanceof z.ZodNumber) return 'number';
    if (inner instanceof z.ZodBoolean) return 'boolean';
    if (inner instanceof z.ZodArray) return 'array';
    if (inner instanceof z.ZodObject) return 'object';
    return 'string'; // default
  }

  /**
   * Helper to create success result
   */
  protected success(output: unknown, metadata?: Record<string, unknown>): ToolResult {
    return {
      success: true,
      output,
      metadata,
    };
  }

  /**
   * Helper to create error result
   */
  protected error(error: string, metadata?: Record<string, unknown>): ToolResult {
    return {
      success: false,
      error,
      metadata,
    };
  }
}
