/**
 * Chat request validation
 */

import { ChatRequest } from '../../types/chat';
import { ValidationError } from '../utils/errors';
import { DEFAULT_MODEL, isSupportedModel } from './models';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a POST /chat body. Runs before any provider call.
 *
 * @throws ValidationError when the message is missing or blank, or the
 *   model is not one of the supported identifiers
 */
export function parseChatRequest(body: unknown): ChatRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const { message, model } = body;

  if (typeof message !== 'string' || message.trim().length === 0) {
    throw new ValidationError('Message is required', 'message');
  }

  if (model === undefined || model === null) {
    return { message, model: DEFAULT_MODEL };
  }

  if (typeof model !== 'string' || !isSupportedModel(model)) {
    throw new ValidationError(`Model not supported: ${String(model)}`, 'model');
  }

  return { message, model };
}
