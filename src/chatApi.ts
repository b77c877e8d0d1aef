/**
 * Chat API endpoint
 *
 * Streams OpenAI chat completions for math questions as Server-Sent Events.
 */

import { Request, Response } from 'express';
import { CompletionProvider } from './lib/chat/provider';
import { parseChatRequest } from './lib/chat/validation';
import { relayCompletion, writableSink } from './lib/chat/relay';
import { ChatRequest, ErrorResponseBody } from './types/chat';
import { ProviderNotConfiguredError, isValidationError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';
import { trackChatStream, trackEvent } from './lib/utils/telemetry';
import { startTransaction, setTag } from './lib/utils/sentry';

export interface ChatApiDependencies {
  /** null when no OpenAI key is configured */
  provider: CompletionProvider | null;
}

const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

function sendError(res: Response, status: number, body: ErrorResponseBody): void {
  res.status(status).json(body);
}

/**
 * Creates the POST /chat handler
 *
 * Validation and configuration failures are answered with a JSON error
 * before the stream opens. After that the status is 200 and failures are
 * reported as in-stream error events.
 */
export function createChatHandler({ provider }: ChatApiDependencies) {
  return async function chatApi(req: Request, res: Response): Promise<void> {
    const startTime = Date.now();

    const transaction = startTransaction('chatApi', 'http.request');
    setTag('function', 'chatApi');

    if (!provider) {
      const notConfigured = new ProviderNotConfiguredError();
      logger.warn('Chat request rejected: provider not configured');
      transaction?.setStatus('unavailable');
      transaction?.finish();

      sendError(res, notConfigured.status, {
        error: notConfigured.message,
        code: notConfigured.code,
      });
      return;
    }

    let chatRequest: ChatRequest;
    try {
      chatRequest = parseChatRequest(req.body);
    } catch (error) {
      if (!isValidationError(error)) {
        throw error;
      }

      logger.warn('Invalid chat request', { reason: error.message, field: error.field });
      trackEvent('ChatApi.ValidationFailed', { field: error.field ?? 'body' });
      transaction?.setStatus('invalid_argument');
      transaction?.finish();

      sendError(res, error.status, {
        error: error.message,
        code: error.code,
        ...(error.field ? { field: error.field } : {}),
      });
      return;
    }

    setTag('model', chatRequest.model);
    logger.info('Chat request received', {
      model: chatRequest.model,
      messageLength: chatRequest.message.length,
    });

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    // Cancels the provider call when the browser goes away mid-stream
    const abortController = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    };
    res.on('close', onClose);

    const outcome = await relayCompletion(
      provider,
      chatRequest,
      writableSink(res, abortController.signal),
      abortController.signal
    );

    res.off('close', onClose);
    if (!res.writableEnded) {
      res.end();
    }

    const duration = Date.now() - startTime;

    if (outcome.status === 'cancelled') {
      logger.info('Client disconnected, provider stream cancelled', {
        model: chatRequest.model,
        fragments: outcome.fragments,
        executionTime: duration,
      });
      transaction?.setStatus('cancelled');
    } else if (outcome.status === 'failed') {
      transaction?.setStatus('internal_error');
    } else {
      logger.info('Chat response completed', {
        model: chatRequest.model,
        fragments: outcome.fragments,
        characters: outcome.characters,
        executionTime: duration,
      });
      transaction?.setStatus('ok');
    }

    trackChatStream({
      model: chatRequest.model,
      outcome: outcome.status,
      durationMs: duration,
      fragments: outcome.fragments,
      characters: outcome.characters,
    });
    transaction?.finish();
  };
}
