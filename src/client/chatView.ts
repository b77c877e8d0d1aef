/**
 * Chat page: message bubbles, the input form and the model selector
 */

import { renderMessageHtml } from './renderPipeline';
import { Typesetter, typesetElement } from './typeset';
import { ChatStreamError, ChatStreamRequest, StreamCallbacks, streamChat } from './chatStream';

export type MessageRole = 'user' | 'assistant';

/**
 * One message on screen. Assistant bubbles keep the response text
 * received so far and re-render all of it on every fragment.
 */
export class MessageBubble {
  readonly element: HTMLElement;
  private readonly body: HTMLElement;
  private accumulatedText = '';

  constructor(
    readonly role: MessageRole,
    private readonly typeset: Typesetter = typesetElement,
    doc: Document = document
  ) {
    this.element = doc.createElement('div');
    this.element.className = `message message-${role}`;
    this.body = doc.createElement('div');
    this.body.className = 'message-body';
    this.element.appendChild(this.body);
  }

  get text(): string {
    return this.accumulatedText;
  }

  /** User messages are shown verbatim */
  setPlainText(text: string): void {
    this.accumulatedText = text;
    this.body.textContent = text;
  }

  append(fragment: string): void {
    this.accumulatedText += fragment;
    this.render();
  }

  render(): void {
    this.body.innerHTML = renderMessageHtml(this.accumulatedText);
    this.typeset(this.body);
  }

  setStreaming(streaming: boolean): void {
    this.element.classList.toggle('streaming', streaming);
  }

  showNotice(text: string, variant: 'error' | 'info'): void {
    const notice = this.element.ownerDocument.createElement('div');
    notice.className = `message-notice message-notice-${variant}`;
    notice.textContent = text;
    this.element.appendChild(notice);
  }
}

export interface ChatViewElements {
  form: HTMLFormElement;
  input: HTMLTextAreaElement | HTMLInputElement;
  modelSelect: HTMLSelectElement;
  messages: HTMLElement;
  sendButton: HTMLButtonElement;
  stopButton: HTMLButtonElement;
}

export type StreamChatFn = (
  request: ChatStreamRequest,
  callbacks: StreamCallbacks,
  signal?: AbortSignal
) => Promise<void>;

/** The subset of fetch() used to load the model list */
export type FetchJsonFn = (
  url: string
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export interface ChatViewOptions {
  streamChat?: StreamChatFn;
  typeset?: Typesetter;
  fetchFn?: FetchJsonFn;
}

interface ModelsResponse {
  models: string[];
  default_model: string;
}

function isModelsResponse(value: unknown): value is ModelsResponse {
  if (typeof value !== 'object' || value === null) return false;
  if (!('models' in value) || !('default_model' in value)) return false;
  const { models, default_model } = value;
  return (
    Array.isArray(models) &&
    models.every((model: unknown) => typeof model === 'string') &&
    typeof default_model === 'string'
  );
}

export class ChatView {
  private readonly streamChat: StreamChatFn;
  private readonly typeset: Typesetter;
  private readonly fetchFn: FetchJsonFn;
  private abortController: AbortController | null = null;

  constructor(private readonly elements: ChatViewElements, options: ChatViewOptions = {}) {
    this.streamChat = options.streamChat ?? streamChat;
    this.typeset = options.typeset ?? typesetElement;
    this.fetchFn = options.fetchFn ?? ((url) => fetch(url));

    elements.form.addEventListener('submit', (event) => {
      event.preventDefault();
      const message = elements.input.value;
      this.send(message).catch((error: unknown) => {
        console.error('[ChatView] Send failed', error);
      });
    });
    elements.stopButton.addEventListener('click', () => this.stop());
    this.setBusy(false);
  }

  get isStreaming(): boolean {
    return this.abortController !== null;
  }

  /**
   * Fills the model selector from GET /models. Keeps whatever options the
   * page already has if the request fails.
   */
  async loadModels(): Promise<void> {
    try {
      const response = await this.fetchFn('/models');
      const body: unknown = await response.json();
      if (!response.ok || !isModelsResponse(body)) {
        throw new Error(`Unexpected /models response (HTTP ${response.status})`);
      }

      const select = this.elements.modelSelect;
      select.replaceChildren(
        ...body.models.map((model) => {
          const option = select.ownerDocument.createElement('option');
          option.value = model;
          option.textContent = model;
          option.selected = model === body.default_model;
          return option;
        })
      );
    } catch (error) {
      console.warn('[ChatView] Could not load models', error);
    }
  }

  /**
   * Sends one message and streams the reply into a new assistant bubble.
   * Blank input and sends while a reply is still streaming are ignored.
   */
  async send(rawMessage: string): Promise<MessageBubble | null> {
    const message = rawMessage.trim();
    if (!message || this.isStreaming) {
      return null;
    }

    const userBubble = this.addBubble('user');
    userBubble.setPlainText(message);
    this.elements.input.value = '';

    const reply = this.addBubble('assistant');
    reply.setStreaming(true);

    const abortController = new AbortController();
    this.abortController = abortController;
    this.setBusy(true);

    const request: ChatStreamRequest = { message };
    if (this.elements.modelSelect.value) {
      request.model = this.elements.modelSelect.value;
    }

    try {
      await this.streamChat(
        request,
        {
          onFragment: (content) => {
            reply.append(content);
            this.scrollToBottom();
          },
          onDone: () => {
            // Re-run so any delimiter left open is shown as plain text
            reply.render();
          },
          onError: (error: ChatStreamError) => {
            reply.render();
            reply.showNotice(`Error: ${error.message}`, 'error');
          },
        },
        abortController.signal
      );
    } finally {
      if (abortController.signal.aborted) {
        reply.showNotice('Stopped', 'info');
      }
      reply.setStreaming(false);
      this.abortController = null;
      this.setBusy(false);
    }

    return reply;
  }

  /** Aborts the reply in progress; the relay then cancels the provider call */
  stop(): void {
    this.abortController?.abort();
  }

  private addBubble(role: MessageRole): MessageBubble {
    const bubble = new MessageBubble(role, this.typeset, this.elements.messages.ownerDocument);
    this.elements.messages.appendChild(bubble.element);
    this.scrollToBottom();
    return bubble;
  }

  private setBusy(busy: boolean): void {
    this.elements.sendButton.disabled = busy;
    this.elements.input.disabled = busy;
    this.elements.stopButton.hidden = !busy;
  }

  private scrollToBottom(): void {
    const container = this.elements.messages;
    container.scrollTop = container.scrollHeight;
  }
}
