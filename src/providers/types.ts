import type { Content } from '@google/genai';
import type { ToolCallRequest, ToolDeclaration, ToolResponse } from '../tools/index.js';

export type ProviderName = 'gemini' | 'openai';

/**
 * Provider-neutral conversation. Each provider maps it onto its own wire format.
 */
export type ConversationItem =
  | { role: 'user'; text: string }
  | { role: 'model'; text: string; toolCalls: ToolCallRequest[]; raw?: Content }
  | { role: 'tool'; call: ToolCallRequest; response: ToolResponse };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelTurn {
  text: string;
  toolCalls: ToolCallRequest[];
  usage: TokenUsage;
  /** Gemini's own content for the turn, replayed as is so thought signatures survive. */
  raw?: Content;
}

export interface GenerateRequest {
  system: string;
  history: ConversationItem[];
  tools: ToolDeclaration[];
}

export interface ModelProvider {
  readonly name: ProviderName;
  readonly model: string;
  generate(request: GenerateRequest): Promise<ModelTurn>;
}
