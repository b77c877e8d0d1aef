/**
 * Completion provider abstraction
 *
 * The relay consumes an ordered stream of text fragments; the OpenAI SDK
 * is one implementation.
 */

import OpenAI from 'openai';
import { buildMessages } from './prompts';
import { ChatRequest } from '../../types/chat';
import { ProviderError, sanitizeProviderError } from '../utils/errors';

export interface CompletionProvider {
  /**
   * Streams the response text for one request, fragment by fragment, in
   * provider order. Aborting the signal cancels the upstream call.
   * Other failures reject with a ProviderError.
   */
  streamCompletion(request: ChatRequest, signal: AbortSignal): AsyncIterable<string>;
}

export interface OpenAIProviderOptions {
  maxTokens: number;
}

export class OpenAICompletionProvider implements CompletionProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIProviderOptions
  ) {}

  async *streamCompletion(request: ChatRequest, signal: AbortSignal): AsyncIterable<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: buildMessages(request.message),
          stream: true,
          max_tokens: this.options.maxTokens,
        },
        { signal }
      );

      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new ProviderError(sanitizeProviderError(error), error);
    }
  }
}
