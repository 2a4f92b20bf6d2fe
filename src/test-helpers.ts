import { MockLanguageModelV2 } from 'ai/test';
import type { GenerateRequest, ModelProvider, ModelTurn } from './providers/index.js';

/**
 * Replays canned turns and records every request it receives. With
 * `repeatLast` the final turn is returned forever.
 */
export class ScriptedProvider implements ModelProvider {
  readonly name = 'gemini' as const;
  readonly model = 'scripted';
  readonly requests: GenerateRequest[] = [];

  constructor(private turns: ModelTurn[], private repeatLast: boolean = false) {}

  async generate(request: GenerateRequest): Promise<ModelTurn> {
    this.requests.push({ ...request, history: [...request.history] });
    const turn = this.repeatLast && this.turns.length === 1 ? this.turns[0] : this.turns.shift();
    if (!turn) {
      throw new Error('script exhausted');
    }
    return turn;
  }
}

export function turn(text: string, toolCalls: ModelTurn['toolCalls'] = []): ModelTurn {
  return { text, toolCalls, usage: { inputTokens: 10, outputTokens: 5 } };
}

export type ScriptedStep = { text: string } | { calls: { name: string; input: object }[] };

/**
 * A language model that answers from a script, one entry per step.
 */
export function scriptedModel(steps: ScriptedStep[]): { model: MockLanguageModelV2; calls: () => number } {
  let index = 0;
  const model = new MockLanguageModelV2({
    doGenerate: async () => {
      const step = steps[Math.min(index, steps.length - 1)];
      index++;
      const usage = { inputTokens: 10, outputTokens: 5, totalTokens: 15 };
      if ('text' in step) {
        return {
          content: [{ type: 'text' as const, text: step.text }],
          finishReason: 'stop' as const,
          usage,
          warnings: [],
        };
      }
      return {
        content: step.calls.map((call, i) => ({
          type: 'tool-call' as const,
          toolCallId: `call-${index}-${i}`,
          toolName: call.name,
          input: JSON.stringify(call.input),
        })),
        finishReason: 'tool-calls' as const,
        usage,
        warnings: [],
      };
    },
  });
  return { model, calls: () => index };
}
