/**
 * LLM Text Generation
 *
 * Last-resort capability for parameters the deterministic parser cannot resolve.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import { UpstreamUnavailableError, errorMessage } from '../errors';

export interface TextGenerator {
  generate(prompt: string, systemInstruction?: string): Promise<string>;
}

/**
 * Generator used when LLM fallback is disabled. Every answer reads as NOT_FOUND.
 */
export class NoopTextGenerator implements TextGenerator {
  async generate(): Promise<string> {
    return '';
  }
}

export interface OpenAiTextGeneratorOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export class OpenAiTextGenerator implements TextGenerator {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAiTextGeneratorOptions = {}) {
    this.model = options.model || config.llmModel;
    this.client = new OpenAI({
      apiKey: options.apiKey || config.openaiApiKey,
      timeout: options.timeoutMs || config.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, systemInstruction?: string): Promise<string> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (systemInstruction) {
      messages.push({ role: 'system', content: systemInstruction });
    }
    messages.push({ role: 'user', content: prompt });

    const startTime = Date.now();
    const endTimer = llmRequestDurationHistogram.startTimer({ model: this.model });

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: 0,
      });

      const content = response.choices[0]?.message?.content ?? '';
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.info('LLM generation complete', {
        model: this.model,
        request_id: response.id,
        duration_ms: Date.now() - startTime,
        tokens_used: response.usage?.total_tokens,
      });

      return content;
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('LLM generation failed', error, {
        model: this.model,
        duration_ms: Date.now() - startTime,
      });
      throw new UpstreamUnavailableError('llm', errorMessage(error), error);
    } finally {
      endTimer();
    }
  }
}
