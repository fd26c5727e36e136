import { generateText, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createXai } from '@ai-sdk/xai';
import type { AiProviderName, AppSettings } from '../config.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../log.js';

export interface GenerateOptions {
  system?: string;
  signal?: AbortSignal;
}

export type GenerateFn = (prompt: string, opts: GenerateOptions) => Promise<string>;

export interface NamedGenerator {
  name: AiProviderName;
  generate: GenerateFn;
}

export function modelGenerator(model: LanguageModel): GenerateFn {
  return async (prompt, opts) => {
    const { text } = await generateText({ model, prompt, system: opts.system, abortSignal: opts.signal });
    return text;
  };
}

/** Generators for the configured providers, in preference order. Unkeyed providers are left out. */
export function generatorsFromSettings(ai: AppSettings['ai']): NamedGenerator[] {
  const out: NamedGenerator[] = [];
  for (const name of ai.order) {
    if (name === 'openai' && ai.openai) {
      const openai = createOpenAI({ apiKey: ai.openai.apiKey });
      out.push({ name, generate: modelGenerator(openai(ai.openai.model)) });
    }
    if (name === 'grok' && ai.grok) {
      const xai = createXai({ apiKey: ai.grok.apiKey });
      out.push({ name, generate: modelGenerator(xai(ai.grok.model)) });
    }
  }
  return out;
}

/** Tries each generator in order and returns the first answer. */
export class TextGenerator {
  private logger: Logger;

  constructor(
    private generators: readonly NamedGenerator[],
    opts: { logger?: Logger } = {},
  ) {
    this.logger = (opts.logger ?? createLogger('silent')).child('ai');
  }

  get providers(): AiProviderName[] {
    return this.generators.map((g) => g.name);
  }

  /** Throws the last provider's error when every provider fails. */
  async generateText(prompt: string, opts: GenerateOptions = {}): Promise<string> {
    if (!this.generators.length) throw new Error('No AI provider is configured');

    let last: unknown;
    for (const g of this.generators) {
      try {
        const text = await g.generate(prompt, opts);
        this.logger.debug('Generated text', { provider: g.name, chars: text.length });
        return text;
      } catch (err) {
        last = err;
        if (opts.signal?.aborted) break;
        this.logger.warn(`AI provider ${g.name} failed`, { error: errorMessage(err) });
      }
    }
    throw last;
  }
}
