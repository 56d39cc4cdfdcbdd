import type { ToolResult } from './types.js';

const ERROR_PREFIX = 'Error: ';

/**
 * Flatten a tool result into the single string an LLM framework expects.
 * Failures always start with "Error: ".
 */
export function toolResultToText(result: ToolResult): string {
  if (result.success) {
    if (result.output === undefined || result.output === null) {
      return '';
    }
    return typeof result.output === 'string'
      ? result.output
      : JSON.stringify(result.output, null, 2);
  }

  const message = result.error ?? 'Unknown error';
  return message.startsWith(ERROR_PREFIX) ? message : `${ERROR_PREFIX}${message}`;
}
