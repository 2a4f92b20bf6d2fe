import * as path from 'path';
import { buildSystemPrompt } from './prompts.js';
import type { ConversationItem, ModelProvider, TokenUsage } from './providers/index.js';
import {
  builtInTools,
  executeTool,
  getToolDeclarations,
  type Tool,
  type ToolCallRequest,
  type ToolContext,
  type ToolResponse,
} from './tools/index.js';

export const DEFAULT_MAX_ITERATIONS = 20;

export interface AgentOptions {
  provider: ModelProvider;
  workingDirectory: string;
  python?: string;
  maxIterations?: number;
  systemPrompt?: string;
  tools?: Tool[];
}

export interface AgentHooks {
  onIteration?: (iteration: number) => void;
  onToolUse?: (call: ToolCallRequest) => void;
  onToolResult?: (call: ToolCallRequest, response: ToolResponse) => void;
}

export interface ToolCallRecord {
  iteration: number;
  call: ToolCallRequest;
  response: ToolResponse;
}

export type StopReason = 'completed' | 'max_iterations';

export interface AgentRunResult {
  finalText: string | null;
  reason: StopReason;
  iterations: number;
  toolCalls: ToolCallRecord[];
  usage: TokenUsage;
  history: ConversationItem[];
}

/**
 * Bounded request/response loop: ask the model, run the tools it asks for,
 * feed the results back, stop at the first turn with no tool calls.
 */
export class AIAgent {
  private provider: ModelProvider;
  private context: ToolContext;
  private maxIterations: number;
  private systemPrompt: string;
  private tools: Tool[];

  constructor(options: AgentOptions) {
    if (options.maxIterations !== undefined && (!Number.isInteger(options.maxIterations) || options.maxIterations < 1)) {
      throw new RangeError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }

    this.provider = options.provider;
    this.context = {
      workingDirectory: path.resolve(options.workingDirectory),
      python: options.python ?? 'python3',
    };
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt(path.basename(this.context.workingDirectory));
    this.tools = options.tools ?? builtInTools;
  }

  getProvider(): ModelProvider {
    return this.provider;
  }

  getWorkingDirectory(): string {
    return this.context.workingDirectory;
  }

  async run(prompt: string, hooks: AgentHooks = {}): Promise<AgentRunResult> {
    const history: ConversationItem[] = [{ role: 'user', text: prompt }];
    const toolCalls: ToolCallRecord[] = [];
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const declarations = getToolDeclarations(this.tools);

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      hooks.onIteration?.(iteration);

      const turn = await this.provider.generate({
        system: this.systemPrompt,
        history,
        tools: declarations,
      });
      usage.inputTokens += turn.usage.inputTokens;
      usage.outputTokens += turn.usage.outputTokens;

      history.push({ role: 'model', text: turn.text, toolCalls: turn.toolCalls, raw: turn.raw });

      if (turn.toolCalls.length === 0) {
        return { finalText: turn.text, reason: 'completed', iterations: iteration, toolCalls, usage, history };
      }

      for (const call of turn.toolCalls) {
        hooks.onToolUse?.(call);
        const response = await executeTool(call, this.context, this.tools);
        hooks.onToolResult?.(call, response);

        toolCalls.push({ iteration, call, response });
        history.push({ role: 'tool', call, response });
      }
    }

    return {
      finalText: null,
      reason: 'max_iterations',
      iterations: this.maxIterations,
      toolCalls,
      usage,
      history,
    };
  }
}
