import { describe, expect, it } from 'vitest';
import { MockLanguageModelV1 } from 'ai/test';
import { TextGenerator, generatorsFromSettings, modelGenerator, type NamedGenerator } from '../src/ai/textGenerator.js';

function generator(name: NamedGenerator['name'], answer: string | Error, calls: string[]): NamedGenerator {
  return {
    name,
    generate: async () => {
      calls.push(name);
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

describe('TextGenerator', () => {
  it('falls back to the next provider', async () => {
    const calls: string[] = [];
    const text = new TextGenerator([
      generator('openai', new Error('rate limited'), calls),
      generator('grok', 'from grok', calls),
    ]);

    expect(await text.generateText('plan my day')).toBe('from grok');
    expect(calls).toEqual(['openai', 'grok']);
  });

  it('throws the last error when every provider fails', async () => {
    const calls: string[] = [];
    const text = new TextGenerator([
      generator('openai', new Error('first down'), calls),
      generator('grok', new Error('second down'), calls),
    ]);
    await expect(text.generateText('plan my day')).rejects.toThrow('second down');
  });

  it('stops trying once the call is aborted', async () => {
    const calls: string[] = [];
    const controller = new AbortController();
    controller.abort();
    const text = new TextGenerator([
      generator('openai', new Error('aborted'), calls),
      generator('grok', 'too late', calls),
    ]);

    await expect(text.generateText('plan my day', { signal: controller.signal })).rejects.toThrow('aborted');
    expect(calls).toEqual(['openai']);
  });

  it('needs at least one provider', async () => {
    const text = new TextGenerator([]);
    expect(text.providers).toEqual([]);
    await expect(text.generateText('plan my day')).rejects.toThrow('No AI provider is configured');
  });
});

describe('generatorsFromSettings', () => {
  it('keeps the configured order and leaves out providers without a key', () => {
    const both = generatorsFromSettings({
      order: ['grok', 'openai'],
      openai: { apiKey: 'test-key', model: 'gpt-4o-mini' },
      grok: { apiKey: 'test-key', model: 'grok-3-mini' },
    });
    expect(both.map((g) => g.name)).toEqual(['grok', 'openai']);

    const one = generatorsFromSettings({ order: ['openai', 'grok'], openai: { apiKey: 'test-key', model: 'gpt-4o-mini' } });
    expect(one.map((g) => g.name)).toEqual(['openai']);
  });
});

describe('modelGenerator', () => {
  it('returns the model text', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: async () => ({
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: 'stop',
        usage: { promptTokens: 10, completionTokens: 4 },
        text: '{"date":"2026-03-02","schedule":[]}',
      }),
    });
    expect(await modelGenerator(model)('plan my day', {})).toBe('{"date":"2026-03-02","schedule":[]}');
  });
});
