/**
 * Relays a provider completion stream to the caller as Server-Sent Events
 */

import { Writable } from 'stream';
import { ChatRequest, StreamEvent } from '../../types/chat';
import { CompletionProvider } from './provider';
import { isProviderError, sanitizeProviderError } from '../utils/errors';
import * as logger from '../utils/logger';

export const DONE_SENTINEL = '[DONE]';

/**
 * Where SSE frames are written. `write` settles once the frame has been
 * handed to the connection, or once the caller has gone away.
 */
export interface EventSink {
  write(frame: string): Promise<void>;
}

/**
 * Adapts a writable stream (the HTTP response) to an EventSink. When the
 * socket buffer is full the write waits for `drain`, so the relay stops
 * pulling from the provider until the client catches up. An abort ends the
 * wait early.
 */
export function writableSink(stream: Writable, signal: AbortSignal): EventSink {
  return {
    write(frame: string): Promise<void> {
      if (stream.write(frame) || signal.aborted) {
        return Promise.resolve();
      }

      return new Promise((resolve) => {
        const settle = () => {
          stream.off('drain', settle);
          signal.removeEventListener('abort', settle);
          resolve();
        };
        stream.once('drain', settle);
        signal.addEventListener('abort', settle, { once: true });
      });
    },
  };
}

export type RelayStatus = 'completed' | 'failed' | 'cancelled';

export interface RelayOutcome {
  status: RelayStatus;
  fragments: number;
  characters: number;
  error?: unknown;
}

/**
 * Frames one SSE event: `data: <payload>\n\n`
 */
export function formatSseEvent(payload: StreamEvent | typeof DONE_SENTINEL): string {
  const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
  return `data: ${data}\n\n`;
}

/**
 * Pulls fragments from the provider one at a time and writes each to the
 * sink as soon as it arrives, followed by the [DONE] sentinel. The next
 * fragment is not pulled until the sink has accepted the previous one.
 *
 * A failure, before or after the first fragment, produces a single error
 * event with a sanitized message. Once the signal is aborted nothing more
 * is written and fragments still in flight are dropped.
 */
export async function relayCompletion(
  provider: CompletionProvider,
  request: ChatRequest,
  sink: EventSink,
  signal: AbortSignal
): Promise<RelayOutcome> {
  let fragments = 0;
  let characters = 0;

  try {
    for await (const fragment of provider.streamCompletion(request, signal)) {
      if (signal.aborted) {
        break;
      }
      await sink.write(formatSseEvent({ content: fragment }));
      fragments++;
      characters += fragment.length;
    }
  } catch (error) {
    if (signal.aborted) {
      return { status: 'cancelled', fragments, characters };
    }

    const cause =
      isProviderError(error) && error.originalError !== undefined ? error.originalError : error;
    logger.logError('OpenAI API error', cause, { model: request.model, fragments });
    await sink.write(formatSseEvent({ error: sanitizeProviderError(error) }));
    return { status: 'failed', fragments, characters, error };
  }

  if (signal.aborted) {
    return { status: 'cancelled', fragments, characters };
  }

  await sink.write(formatSseEvent(DONE_SENTINEL));
  return { status: 'completed', fragments, characters };
}
