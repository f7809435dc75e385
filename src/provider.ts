import { OpenAI } from 'openai';
import { EmptyCompletionError } from './errors';
import type {
  ConversionConfig,
  ConversionPrompt,
  TextCompletionProvider,
} from './types';

export const DEFAULT_MODEL = 'gpt-4.1-mini-2025-04-14';
export const DEFAULT_TEMPERATURE = 0.3;

// One chat completion per call: no retry, no streaming.
export class OpenAIProvider implements TextCompletionProvider {
  private readonly client: OpenAI;

  constructor(private readonly config: ConversionConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async complete(prompt: ConversionPrompt): Promise<string> {
    const resp = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
    });

    const content = resp.choices[0]?.message.content;
    if (content == null) {
      throw new EmptyCompletionError(this.config.model);
    }
    return content;
  }
}

export const createOpenAIProvider = (config: ConversionConfig) =>
  new OpenAIProvider(config);
