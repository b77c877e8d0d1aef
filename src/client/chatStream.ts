/**
 * Browser side of POST /chat: sends a message and reads the SSE reply
 */

export const DONE_SENTINEL = '[DONE]';

export interface ChatStreamRequest {
  message: string;
  model?: string;
}

export interface StreamCallbacks {
  onFragment: (content: string) => void;
  onDone: () => void;
  onError: (error: ChatStreamError) => void;
}

export type ChatStreamErrorKind = 'request' | 'provider' | 'interrupted';

export class ChatStreamError extends Error {
  constructor(message: string, public kind: ChatStreamErrorKind, public status?: number) {
    super(message);
    this.name = 'ChatStreamError';
    Object.setPrototypeOf(this, ChatStreamError.prototype);
  }
}

export interface ParsedEvents {
  /** data payloads of every complete event, in order */
  events: string[];
  /** trailing partial event, to be prefixed to the next chunk */
  rest: string;
}

/**
 * Splits buffered SSE text into complete events. Multi-line data fields are
 * joined with newlines; other fields are ignored.
 */
export function parseSseEvents(buffer: string): ParsedEvents {
  const normalized = buffer.replace(/\r\n?/g, '\n');
  const blocks = normalized.split('\n\n');
  const rest = blocks.pop() ?? '';

  const events: string[] = [];
  for (const block of blocks) {
    const data = block
      .split('\n')
      .filter((line) => line.startsWith('data:'))
      .map((line) => line.slice(5).replace(/^ /, ''));
    if (data.length > 0) {
      events.push(data.join('\n'));
    }
  }

  return { events, rest };
}

type StreamMessage = { kind: 'done' } | { kind: 'content'; content: string } | { kind: 'error'; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Interprets one data payload from the relay
 */
export function decodeEvent(payload: string): StreamMessage | null {
  if (payload === DONE_SENTINEL) {
    return { kind: 'done' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    console.warn('[ChatStream] Ignoring malformed event', payload);
    return null;
  }

  if (isRecord(parsed)) {
    if (typeof parsed.error === 'string') {
      return { kind: 'error', error: parsed.error };
    }
    if (typeof parsed.content === 'string') {
      return { kind: 'content', content: parsed.content };
    }
  }
  return null;
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (isRecord(body) && typeof body.error === 'string') {
      return body.error;
    }
  } catch {
    // Not JSON; fall back to the status line
  }
  return `HTTP ${response.status}`;
}

/**
 * Posts a chat message and dispatches fragments as they arrive. Exactly one
 * of onDone or onError is called, unless the signal aborts the request, in
 * which case neither is.
 */
export async function streamChat(
  request: ChatStreamRequest,
  callbacks: StreamCallbacks,
  signal?: AbortSignal,
  endpoint: string = '/chat'
): Promise<void> {
  let response: Response;
  try {
    response = await fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
      body: JSON.stringify(request),
      signal,
    });
  } catch (error) {
    if (signal?.aborted) return;
    console.warn('[ChatStream] Request failed', error);
    callbacks.onError(new ChatStreamError('Could not reach the server', 'request'));
    return;
  }

  if (!response.ok || !response.body) {
    callbacks.onError(
      new ChatStreamError(await readErrorMessage(response), 'request', response.status)
    );
    return;
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let settled = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

      const { events, rest } = parseSseEvents(buffer);
      buffer = rest;

      for (const payload of events) {
        const message = decodeEvent(payload);
        if (!message) continue;

        if (message.kind === 'content') {
          callbacks.onFragment(message.content);
        } else if (message.kind === 'done') {
          settled = true;
          callbacks.onDone();
          await reader.cancel();
          return;
        } else {
          settled = true;
          callbacks.onError(new ChatStreamError(message.error, 'provider'));
          await reader.cancel();
          return;
        }
      }

      if (done) break;
    }
  } catch (error) {
    if (settled || signal?.aborted) return;
    console.warn('[ChatStream] Stream read failed', error);
  }

  callbacks.onError(new ChatStreamError('The response stream was interrupted', 'interrupted'));
}
