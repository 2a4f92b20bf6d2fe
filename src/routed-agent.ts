/**
 * Routed variant: the `ai` SDK picks the model from a `provider:model`
 * string and drives the tool loop itself.
 */

import * as path from 'path';
import { generateText, stepCountIs, tool, type LanguageModel, type ToolSet } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { DEFAULT_MAX_ITERATIONS } from './agent.js';
import { ConfigError, toProviderError } from './errors.js';
import { buildRoutedSystemPrompt } from './prompts.js';
import type { TokenUsage } from './providers/index.js';
import {
  builtInTools,
  executeTool,
  toolResponseText,
  type Tool,
  type ToolCallRequest,
  type ToolContext,
} from './tools/index.js';

export const DEFAULT_ROUTED_MODEL = 'anthropic:claude-3-5-sonnet-latest';

export type RoutedProviderName = 'google' | 'openai' | 'anthropic';

const API_KEY_VARIABLES: Record<RoutedProviderName, string[]> = {
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY', 'GOOGLE_GENERATIVE_AI_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
};

export class UnknownModelError extends ConfigError {
  constructor(spec: string) {
    super(
      `Unknown model '${spec}'. Use <provider>:<model> with provider google, openai or anthropic ` +
        `(e.g. google:gemini-2.0-flash, openai:gpt-4o-mini, anthropic:claude-3-5-sonnet-latest)`
    );
    this.name = 'UnknownModelError';
  }
}

export class MissingApiKeyError extends ConfigError {
  readonly variables: string[];

  constructor(provider: RoutedProviderName, variables: string[]) {
    super(`Missing API key for ${provider}. Set it with:\n  export ${variables[0]}=<your key>`);
    this.name = 'MissingApiKeyError';
    this.variables = variables;
  }
}

export interface ModelSpec {
  provider: RoutedProviderName;
  modelId: string;
}

export function parseModelSpec(spec: string): ModelSpec {
  const separator = spec.indexOf(':');
  if (separator <= 0 || separator === spec.length - 1) {
    throw new UnknownModelError(spec);
  }

  const provider = spec.slice(0, separator).toLowerCase();
  const modelId = spec.slice(separator + 1);
  switch (provider) {
    case 'google':
    case 'gemini':
      return { provider: 'google', modelId };
    case 'openai':
      return { provider: 'openai', modelId };
    case 'anthropic':
    case 'claude':
      return { provider: 'anthropic', modelId };
    default:
      throw new UnknownModelError(spec);
  }
}

export function resolveRoutedModel(spec: string, env: NodeJS.ProcessEnv = process.env): LanguageModel {
  const { provider, modelId } = parseModelSpec(spec);
  const variables = API_KEY_VARIABLES[provider];
  const apiKey = variables.map(name => env[name]).find(value => !!value);
  if (!apiKey) {
    throw new MissingApiKeyError(provider, variables);
  }

  switch (provider) {
    case 'google':
      return createGoogleGenerativeAI({ apiKey })(modelId);
    case 'openai':
      return createOpenAI({ apiKey, baseURL: env.OPENAI_BASE_URL })(modelId);
    case 'anthropic':
      return createAnthropic({ apiKey })(modelId);
  }
}

export interface RoutedToolCall {
  name: string;
  args: unknown;
}

export interface RoutedAgentOptions {
  model: LanguageModel;
  workingDirectory: string;
  python?: string;
  maxIterations?: number;
  systemPrompt?: string;
  tools?: Tool[];
  onToolUse?: (call: ToolCallRequest) => void;
}

export interface RoutedRunResult {
  text: string;
  steps: number;
  toolCalls: RoutedToolCall[];
  usage: TokenUsage;
}

export function buildToolSet(tools: Tool[], context: ToolContext, onToolUse?: (call: ToolCallRequest) => void): ToolSet {
  const toolSet: ToolSet = {};
  for (const t of tools) {
    toolSet[t.name] = tool({
      description: t.description,
      inputSchema: t.schema,
      execute: async (input: unknown) => {
        const call: ToolCallRequest = { name: t.name, args: input };
        onToolUse?.(call);
        return toolResponseText(await executeTool(call, context, tools));
      },
    });
  }
  return toolSet;
}

/**
 * Keep the first occurrence of every distinct name + arguments pair.
 */
export function collectUniqueToolCalls(calls: RoutedToolCall[]): RoutedToolCall[] {
  const seen = new Set<string>();
  const unique: RoutedToolCall[] = [];
  for (const call of calls) {
    const key = `${call.name}_${JSON.stringify(call.args ?? {})}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(call);
    }
  }
  return unique;
}

export function formatRoutedToolCall(call: RoutedToolCall): string {
  const args =
    typeof call.args === 'object' && call.args !== null
      ? Object.entries(call.args).map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(', ')
      : '';
  return `${call.name}(${args})`;
}

export async function runRoutedAgent(prompt: string, options: RoutedAgentOptions): Promise<RoutedRunResult> {
  const context: ToolContext = {
    workingDirectory: path.resolve(options.workingDirectory),
    python: options.python ?? 'python3',
  };
  const tools = options.tools ?? builtInTools;

  try {
    const result = await generateText({
      model: options.model,
      system: options.systemPrompt ?? buildRoutedSystemPrompt(),
      prompt,
      tools: buildToolSet(tools, context, options.onToolUse),
      stopWhen: stepCountIs(options.maxIterations ?? DEFAULT_MAX_ITERATIONS),
    });

    const toolCalls = result.steps.flatMap(step =>
      step.toolCalls.map(call => ({ name: call.toolName, args: call.input }))
    );

    return {
      text: result.text,
      steps: result.steps.length,
      toolCalls: collectUniqueToolCalls(toolCalls),
      usage: {
        inputTokens: result.totalUsage.inputTokens ?? 0,
        outputTokens: result.totalUsage.outputTokens ?? 0,
      },
    };
  } catch (error) {
    throw toProviderError('ai-sdk', error);
  }
}
