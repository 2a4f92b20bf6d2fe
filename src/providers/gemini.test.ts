import { afterEach, describe, expect, it, vi } from 'vitest';
import { GeminiProvider, toGeminiContents } from './gemini.js';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

const request = { system: 'sys', history: [{ role: 'user' as const, text: 'hi' }], tools: [] };

afterEach(() => {
  vi.restoreAllMocks();
  generateContent.mockReset();
});

describe('GeminiProvider.generate', () => {
  it('reads tool calls from the parts and keeps the raw content', async () => {
    const parts = [{ functionCall: { name: 'todo_list', args: {} }, thoughtSignature: 'test-signature' }];
    generateContent.mockResolvedValue({
      candidates: [{ content: { role: 'model', parts } }],
      usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 3 },
    });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await new GeminiProvider({ apiKey: 'test-key' }).generate(request);

    expect(result).toEqual({
      text: '',
      toolCalls: [{ id: undefined, name: 'todo_list', args: {} }],
      raw: { role: 'model', parts },
      usage: { inputTokens: 12, outputTokens: 3 },
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('joins text parts and leaves out thoughts', async () => {
    generateContent.mockResolvedValue({
      candidates: [
        {
          content: {
            role: 'model',
            parts: [{ text: 'Planning...', thought: true }, { text: 'Hello ' }, { text: 'there' }],
          },
        },
      ],
    });

    const result = await new GeminiProvider({ apiKey: 'test-key' }).generate(request);

    expect(result.text).toBe('Hello there');
    expect(result.toolCalls).toEqual([]);
    expect(result.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('sends the system prompt and the mapped history', async () => {
    generateContent.mockResolvedValue({ candidates: [] });

    await new GeminiProvider({ apiKey: 'test-key', model: 'gemini-test' }).generate(request);

    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: [{ role: 'user', parts: [{ text: 'hi' }] }],
      config: { systemInstruction: 'sys', tools: [{ functionDeclarations: [] }] },
    });
  });

  it('wraps request failures with their status', async () => {
    generateContent.mockRejectedValue(Object.assign(new Error('quota exceeded'), { status: 429 }));

    await expect(new GeminiProvider({ apiKey: 'test-key' }).generate(request)).rejects.toMatchObject({
      name: 'ProviderError',
      provider: 'gemini',
      status: 429,
      message: 'quota exceeded',
    });
  });
});

describe('toGeminiContents', () => {
  it('replays raw model content untouched', () => {
    const raw = {
      role: 'model',
      parts: [{ functionCall: { name: 'todo_list', args: {} }, thoughtSignature: 'test-signature' }],
    };

    expect(
      toGeminiContents([{ role: 'model', text: '', toolCalls: [{ name: 'todo_list', args: {} }], raw }])
    ).toEqual([raw]);
  });
});
