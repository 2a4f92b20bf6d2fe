import { z } from 'zod';
import { ToolArgumentError } from '../errors.js';

export type ToolName =
  | 'list_files'
  | 'get_file_content'
  | 'overwrite_file'
  | 'replace_str_file'
  | 'run_python_file'
  | 'todo_add'
  | 'todo_list'
  | 'todo_done';

/**
 * Values the dispatcher injects into every call. The model never supplies these.
 */
export interface ToolContext {
  workingDirectory: string;
  python: string;
}

export interface Tool {
  name: ToolName;
  description: string;
  schema: z.ZodType;
  invoke: (args: unknown, context: ToolContext) => Promise<string>;
}

interface ToolSpec<S extends z.ZodType> {
  name: ToolName;
  description: string;
  schema: S;
  run: (args: z.infer<S>, context: ToolContext) => Promise<string>;
}

/**
 * Bind a tool's schema to its implementation so arguments are checked before `run` sees them.
 */
export function defineTool<S extends z.ZodType>(spec: ToolSpec<S>): Tool {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    invoke: async (args, context) => {
      const parsed = spec.schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolArgumentError(spec.name, formatIssues(parsed.error));
      }
      return spec.run(parsed.data, context);
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * JSON Schema for a tool's arguments, in the form the model APIs accept.
 */
export function toParametersSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { ...z.toJSONSchema(schema) };
  delete jsonSchema.$schema;
  return jsonSchema;
}
