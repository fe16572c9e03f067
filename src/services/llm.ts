/**
 * LLM integration layer using Vercel AI SDK.
 *
 * The pipeline only sees {@link LanguageModelClient}; tests substitute a
 * scripted implementation.
 */

import { generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { LLMConfig } from '../config.js';
import { LLMError, errorMessage } from '../types/errors.js';
import type { PromptMessage } from '../types/models.js';
import { logger } from '../utils/logger.js';

/**
 * Narrow capability the pipeline needs from a language model.
 */
export interface LanguageModelClient {
  complete(messages: readonly PromptMessage[]): Promise<string>;
}

/**
 * Map prompt messages onto AI SDK model messages.
 */
export function toModelMessages(messages: readonly PromptMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage =>
    message.role === 'system'
      ? { role: 'system', content: message.content }
      : { role: 'user', content: message.content }
  );
}

/**
 * Service for interacting with LLM APIs via AI SDK.
 * Sampling is fixed at temperature 0.
 */
export class LLMService implements LanguageModelClient {
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly temperature = 0;

  constructor(private config: LLMConfig) {}

  /**
   * Lazy initialization of the LLM model.
   * Concurrent callers share the same load.
   */
  private initializeModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().catch((error: unknown) => {
        this.modelPromise = null;
        throw error;
      });
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration.
   */
  private async loadModel(): Promise<LanguageModel> {
    const { provider, model, apiKey } = this.config;

    if (!apiKey) {
      const envKey = provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
      throw new LLMError(`${envKey} is required when LLM_PROVIDER is ${provider}`);
    }

    logger.info(`Initializing LLM: ${provider}/${model}`);

    switch (provider) {
      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(model);
      }

      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(model);
      }
    }
  }

  /**
   * Send prompt messages and return the response text.
   *
   * @throws LLMError if every attempt fails
   */
  async complete(messages: readonly PromptMessage[]): Promise<string> {
    const model = await this.initializeModel();
    const maxRetries = this.config.maxRetries;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        const result = await generateText({
          model,
          messages: toModelMessages(messages),
          temperature: this.temperature,
          maxOutputTokens: this.config.maxTokens,
          // Retries are governed by LLM_MAX_RETRIES, not the SDK.
          maxRetries: 0,
        });

        logger.debug(
          `LLM API call successful - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );

        return result.text;
      } catch (error) {
        const waitTime = Math.pow(2, attempt); // Exponential backoff
        logger.warn(
          `LLM API call failed (attempt ${attempt + 1}/${maxRetries}): ${errorMessage(error)}`
        );

        if (attempt < maxRetries - 1) {
          logger.info(`Retrying in ${waitTime} seconds...`);
          await new Promise((resolve) => setTimeout(resolve, waitTime * 1000));
        } else {
          throw new LLMError(
            `LLM API failed after ${maxRetries} attempt(s): ${errorMessage(error)}`
          );
        }
      }
    }

    throw new LLMError('Unexpected error in complete');
  }
}
