import { fileTools } from './files.js';
import { runPythonFile } from './python.js';
import { todoTools } from './todos.js';
import { toParametersSchema, type Tool } from './types.js';

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

// The whitelist: the model can reach nothing that is not listed here.
export const builtInTools: Tool[] = [...fileTools, runPythonFile, ...todoTools];

export function getTool(name: string, tools: Tool[] = builtInTools): Tool | undefined {
  return tools.find(t => t.name === name);
}

export function getToolDeclarations(tools: Tool[] = builtInTools): ToolDeclaration[] {
  return tools.map(t => ({
    name: t.name,
    description: t.description,
    parameters: toParametersSchema(t.schema),
  }));
}
