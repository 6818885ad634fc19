// src/services/generation.ts
// What: Text generation client over an OpenAI-compatible chat completions API.
// How: Sends the grounded prompt as the only user message (no history is carried to the service). Transient
//      failures are retried with backoff; a final failure or an empty completion rejects with GenerationError.

import defaultLogger, { type Logger } from '../logging.js';
import { GenerationError, errorMessage } from '../errors.js';
import { withBackoff } from '../util/retry.js';

export interface GenerationClient {
  generate(prompt: string): Promise<string>;
}

/** The slice of the OpenAI SDK this client calls. */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: {
        model: string;
        temperature?: number;
        messages: Array<{ role: 'user'; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIGenerationClientOptions {
  api: ChatCompletionsApi;
  model: string;
  temperature?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
  logger?: Logger;
}

export class OpenAIGenerationClient implements GenerationClient {
  private readonly options: Required<Omit<OpenAIGenerationClientOptions, 'temperature'>> & { temperature?: number };

  constructor({ maxAttempts = 3, initialDelayMs = 500, logger = defaultLogger, ...rest }: OpenAIGenerationClientOptions) {
    this.options = { ...rest, maxAttempts: Math.max(1, maxAttempts), initialDelayMs, logger };
  }

  async generate(prompt: string): Promise<string> {
    const { api, model, temperature, maxAttempts, initialDelayMs, logger } = this.options;
    let completion: Awaited<ReturnType<ChatCompletionsApi['chat']['completions']['create']>>;
    try {
      completion = await withBackoff(
        () =>
          api.chat.completions.create({
            model,
            ...(temperature === undefined ? {} : { temperature }),
            messages: [{ role: 'user', content: prompt }],
          }),
        { label: 'Generation', maxAttempts, initialDelayMs, logger },
      );
    } catch (err) {
      throw new GenerationError(`Generation request failed: ${errorMessage(err)}`, err);
    }

    const text = completion.choices[0]?.message.content?.trim();
    if (!text) {
      throw new GenerationError('Generation response did not contain any content');
    }
    return text;
  }
}
