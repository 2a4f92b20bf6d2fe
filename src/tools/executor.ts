import { ToolArgumentError, errorMessage } from '../errors.js';
import { builtInTools, getTool } from './registry.js';
import type { Tool, ToolContext } from './types.js';

export interface ToolCallRequest {
  id?: string;
  name: string;
  args: unknown;
}

export type ToolResponse = { result: string } | { error: string };

/**
 * Dispatch one model tool call. Failures come back as `{ error }` so the
 * model can see them; nothing thrown by a tool escapes.
 */
export async function executeTool(
  call: ToolCallRequest,
  context: ToolContext,
  tools: Tool[] = builtInTools
): Promise<ToolResponse> {
  const tool = getTool(call.name, tools);
  if (!tool) {
    return { error: `Unknown function: ${call.name}` };
  }

  try {
    const result = await tool.invoke(call.args, context);
    return { result };
  } catch (error) {
    if (error instanceof ToolArgumentError) {
      return { error: `Invalid arguments for ${call.name}: ${error.message}` };
    }
    return { error: `Error: ${errorMessage(error)}` };
  }
}

export function toolResponseText(response: ToolResponse): string {
  return 'error' in response ? response.error : response.result;
}

export function formatToolAnnouncement(call: ToolCallRequest, verbose: boolean = false): string {
  if (!verbose) {
    return ` - Calling function: ${call.name}`;
  }
  return ` - Calling function: ${call.name}(${JSON.stringify(call.args ?? {})})`;
}
