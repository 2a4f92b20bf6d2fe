/**
 * Gemini provider built on the Google Gen AI SDK.
 */

import { GoogleGenAI, type Content, type FunctionDeclaration, type Part } from '@google/genai';
import { ConfigError, toProviderError } from '../errors.js';
import type { ToolDeclaration } from '../tools/index.js';
import type { ConversationItem, GenerateRequest, ModelProvider, ModelTurn } from './types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash-001';

export interface GeminiProviderOptions {
  apiKey?: string;
  model?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map the neutral history onto Gemini contents. Consecutive tool results are
 * grouped into a single user turn, which is how Gemini expects parallel calls answered.
 */
export function toGeminiContents(history: ConversationItem[]): Content[] {
  const contents: Content[] = [];

  for (const item of history) {
    switch (item.role) {
      case 'user':
        contents.push({ role: 'user', parts: [{ text: item.text }] });
        break;

      case 'model': {
        if (item.raw) {
          contents.push(item.raw);
          break;
        }
        const parts: Part[] = [];
        if (item.text) {
          parts.push({ text: item.text });
        }
        for (const call of item.toolCalls) {
          parts.push({
            functionCall: { id: call.id, name: call.name, args: isRecord(call.args) ? call.args : {} },
          });
        }
        contents.push({ role: 'model', parts });
        break;
      }

      case 'tool': {
        const part: Part = {
          functionResponse: { id: item.call.id, name: item.call.name, response: item.response },
        };
        const previous = contents[contents.length - 1];
        const previousIsToolTurn =
          previous?.role === 'user' && (previous.parts ?? []).every(p => p.functionResponse !== undefined);
        if (previous && previousIsToolTurn) {
          (previous.parts ??= []).push(part);
        } else {
          contents.push({ role: 'user', parts: [part] });
        }
        break;
      }
    }
  }

  return contents;
}

export function toFunctionDeclarations(tools: ToolDeclaration[]): FunctionDeclaration[] {
  return tools.map(t => ({
    name: t.name,
    description: t.description,
    parametersJsonSchema: t.parameters,
  }));
}

export class GeminiProvider implements ModelProvider {
  public readonly name = 'gemini' as const;
  public readonly model: string;

  private client: GoogleGenAI;

  constructor(options: GeminiProviderOptions = {}) {
    const apiKey = options.apiKey || process.env.GEMINI_API_KEY || process.env.GOOGLE_API_KEY;
    if (!apiKey) {
      throw new ConfigError(
        'Gemini API key is required. Set GEMINI_API_KEY or GOOGLE_API_KEY environment variable.'
      );
    }

    this.model = options.model || DEFAULT_GEMINI_MODEL;
    this.client = new GoogleGenAI({ apiKey });
  }

  async generate(request: GenerateRequest): Promise<ModelTurn> {
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: toGeminiContents(request.history),
        config: {
          systemInstruction: request.system,
          tools: [{ functionDeclarations: toFunctionDeclarations(request.tools) }],
        },
      });

      // The SDK's `text` and `functionCalls` getters warn on mixed parts, so read the parts directly.
      const content = response.candidates?.[0]?.content;
      const parts = content?.parts ?? [];

      return {
        text: parts
          .filter(part => !part.thought)
          .map(part => part.text ?? '')
          .join(''),
        toolCalls: parts.flatMap(part =>
          part.functionCall
            ? [{ id: part.functionCall.id, name: part.functionCall.name ?? '', args: part.functionCall.args ?? {} }]
            : []
        ),
        raw: content ? { role: content.role ?? 'model', parts } : undefined,
        usage: {
          inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
          outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        },
      };
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }
}
