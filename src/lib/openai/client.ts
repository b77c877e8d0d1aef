/**
 * OpenAI client initialization
 */

import OpenAI from 'openai';
import { AppConfig } from '../../types/config';
import * as logger from '../utils/logger';

/**
 * Creates the process-wide OpenAI client, or returns null when no API key
 * is configured so the server can still start.
 */
export function createOpenAIClient(config: AppConfig): OpenAI | null {
  if (!config.openaiApiKey) {
    logger.warn('OpenAI API key not found - client not initialized');
    return null;
  }

  logger.info('Initializing OpenAI client');

  return new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: 60000, // 60 second timeout per request
    maxRetries: 2, // SDK retries on connection errors and 429/5xx before the stream opens
  });
}
