import OpenAI from 'openai';
import { ConfigError, toProviderError } from '../errors.js';
import type { ToolDeclaration } from '../tools/index.js';
import type { ConversationItem, GenerateRequest, ModelProvider, ModelTurn } from './types.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
}

/**
 * Tool arguments arrive as a JSON string. A string that does not parse is
 * passed through untouched so argument validation reports it.
 */
export function parseToolArguments(raw: string): unknown {
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function toOpenAIMessages(system: string, history: ConversationItem[]): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: system }];

  for (const item of history) {
    switch (item.role) {
      case 'user':
        messages.push({ role: 'user', content: item.text });
        break;

      case 'model':
        if (item.toolCalls.length === 0) {
          messages.push({ role: 'assistant', content: item.text });
        } else {
          messages.push({
            role: 'assistant',
            content: item.text || null,
            tool_calls: item.toolCalls.map(call => ({
              id: call.id ?? '',
              type: 'function' as const,
              function: {
                name: call.name,
                arguments: typeof call.args === 'string' ? call.args : JSON.stringify(call.args ?? {}),
              },
            })),
          });
        }
        break;

      case 'tool':
        messages.push({
          role: 'tool',
          tool_call_id: item.call.id ?? '',
          content: JSON.stringify(item.response),
        });
        break;
    }
  }

  return messages;
}

export function toChatTools(tools: ToolDeclaration[]): ChatTool[] {
  return tools.map(t => ({
    type: 'function',
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }));
}

/**
 * Any OpenAI-compatible chat completions endpoint (OpenAI, Ollama, vLLM, ...).
 */
export class OpenAIProvider implements ModelProvider {
  public readonly name = 'openai' as const;
  public readonly model: string;

  private client: OpenAI;

  constructor(options: OpenAIProviderOptions = {}) {
    const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
    const baseURL = options.baseURL || process.env.OPENAI_BASE_URL;

    // Local endpoints usually accept any key, so one is only demanded for the default endpoint.
    if (!apiKey && !baseURL) {
      throw new ConfigError('OpenAI API key is required. Set OPENAI_API_KEY or point OPENAI_BASE_URL at a compatible endpoint.');
    }

    this.model = options.model || DEFAULT_OPENAI_MODEL;
    this.client = new OpenAI({
      apiKey: apiKey || 'not-needed',
      baseURL,
    });
  }

  async generate(request: GenerateRequest): Promise<ModelTurn> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: toOpenAIMessages(request.system, request.history),
        tools: toChatTools(request.tools),
      });

      const message = completion.choices[0]?.message;
      const toolCalls = (message?.tool_calls ?? [])
        .filter(tc => tc.type === 'function')
        .map(tc => ({
          id: tc.id,
          name: tc.function.name,
          args: parseToolArguments(tc.function.arguments),
        }));

      return {
        text: message?.content ?? '',
        toolCalls,
        usage: {
          inputTokens: completion.usage?.prompt_tokens ?? 0,
          outputTokens: completion.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }
}
