/**
 * @jest-environment jsdom
 */

import { ChatView, ChatViewElements, FetchJsonFn, StreamChatFn } from '../../../src/client/chatView';
import { ChatStreamError } from '../../../src/client/chatStream';

function byId<T extends HTMLElement>(id: string, ctor: new () => T): T {
  const element = document.getElementById(id);
  if (!(element instanceof ctor)) {
    throw new Error(`Missing #${id}`);
  }
  return element;
}

function renderPage(): ChatViewElements {
  document.body.innerHTML = `
    <form id="chat-form">
      <select id="model-select"><option value="gpt-4o-mini" selected>gpt-4o-mini</option></select>
      <textarea id="chat-input"></textarea>
      <button id="send-button" type="submit">Send</button>
      <button id="stop-button" type="button">Stop</button>
    </form>
    <div id="messages"></div>
  `;
  return {
    form: byId('chat-form', HTMLFormElement),
    input: byId('chat-input', HTMLTextAreaElement),
    modelSelect: byId('model-select', HTMLSelectElement),
    messages: byId('messages', HTMLDivElement),
    sendButton: byId('send-button', HTMLButtonElement),
    stopButton: byId('stop-button', HTMLButtonElement),
  };
}

function waitForAbort(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

describe('ChatView', () => {
  let elements: ChatViewElements;
  let typeset: jest.Mock<void, [HTMLElement]>;

  beforeEach(() => {
    elements = renderPage();
    typeset = jest.fn();
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start idle', () => {
    new ChatView(elements, { typeset, streamChat: jest.fn() });

    expect(elements.sendButton.disabled).toBe(false);
    expect(elements.stopButton.hidden).toBe(true);
  });

  it('should stream a reply into an assistant bubble', async () => {
    const streamChat = jest.fn<ReturnType<StreamChatFn>, Parameters<StreamChatFn>>(
      async (_request, callbacks) => {
        callbacks.onFragment('The answer is ');
        callbacks.onFragment('$4$');
        callbacks.onDone();
      }
    );
    const view = new ChatView(elements, { typeset, streamChat });
    elements.input.value = '  What is 2+2?  ';

    const reply = await view.send(elements.input.value);

    expect(streamChat).toHaveBeenCalledWith(
      { message: 'What is 2+2?', model: 'gpt-4o-mini' },
      expect.anything(),
      expect.any(AbortSignal)
    );
    expect(elements.messages.children).toHaveLength(2);
    expect(elements.messages.querySelector('.message-user .message-body')?.textContent).toBe(
      'What is 2+2?'
    );
    expect(reply?.text).toBe('The answer is $4$');
    expect(reply?.element.querySelector('.message-body p')?.textContent).toBe('The answer is $4$');
    expect(reply?.element.querySelector('span.math-tex')?.getAttribute('data-tex')).toBe('4');
    expect(reply?.element.classList.contains('streaming')).toBe(false);
    expect(elements.input.value).toBe('');

    // one pass per fragment plus the final render
    expect(typeset).toHaveBeenCalledTimes(3);
    expect(typeset).toHaveBeenLastCalledWith(
      elements.messages.querySelector('.message-assistant .message-body')
    );
  });

  it('should show user text verbatim without Markdown', async () => {
    const view = new ChatView(elements, { typeset, streamChat: jest.fn(async () => undefined) });

    await view.send('**bold** <b>tag</b>');

    const userBody = elements.messages.querySelector('.message-user .message-body');
    expect(userBody?.textContent).toBe('**bold** <b>tag</b>');
    expect(userBody?.querySelector('b')).toBeNull();
  });

  it('should ignore blank input', async () => {
    const streamChat = jest.fn();
    const view = new ChatView(elements, { typeset, streamChat });

    await expect(view.send('   ')).resolves.toBeNull();
    expect(streamChat).not.toHaveBeenCalled();
    expect(elements.messages.children).toHaveLength(0);
  });

  it('should ignore sends while a reply is streaming and disable the form', async () => {
    let finish: () => void = () => undefined;
    const streamChat = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const view = new ChatView(elements, { typeset, streamChat });

    const first = view.send('first');
    expect(view.isStreaming).toBe(true);
    expect(elements.sendButton.disabled).toBe(true);
    expect(elements.input.disabled).toBe(true);
    expect(elements.stopButton.hidden).toBe(false);

    await expect(view.send('second')).resolves.toBeNull();

    finish();
    await first;
    expect(streamChat).toHaveBeenCalledTimes(1);
    expect(view.isStreaming).toBe(false);
    expect(elements.sendButton.disabled).toBe(false);
  });

  it('should keep partial text and show the error notice', async () => {
    const streamChat: StreamChatFn = async (_request, callbacks) => {
      callbacks.onFragment('Partial $x');
      callbacks.onError(new ChatStreamError('Provider rate limit exceeded', 'provider'));
    };
    const view = new ChatView(elements, { typeset, streamChat });

    const reply = await view.send('hi');

    expect(reply?.element.querySelector('.message-body')?.innerHTML).toContain('<p>Partial $x</p>');
    expect(reply?.element.querySelector('.message-notice-error')?.textContent).toBe(
      'Error: Provider rate limit exceeded'
    );
  });

  it('should stop the stream on the stop button', async () => {
    const streamChat: StreamChatFn = async (_request, callbacks, signal) => {
      callbacks.onFragment('Let me think');
      await waitForAbort(signal);
    };
    const view = new ChatView(elements, { typeset, streamChat });

    const pending = view.send('hi');
    elements.stopButton.click();
    const reply = await pending;

    expect(reply?.text).toBe('Let me think');
    expect(reply?.element.querySelector('.message-notice-info')?.textContent).toBe('Stopped');
    expect(elements.stopButton.hidden).toBe(true);
  });

  it('should send on form submit', async () => {
    const streamChat = jest.fn(async () => undefined);
    new ChatView(elements, { typeset, streamChat });
    elements.input.value = 'Derive the quadratic formula';

    elements.form.dispatchEvent(new Event('submit', { cancelable: true }));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(streamChat).toHaveBeenCalledWith(
      { message: 'Derive the quadratic formula', model: 'gpt-4o-mini' },
      expect.anything(),
      expect.any(AbortSignal)
    );
  });

  describe('loadModels', () => {
    it('should fill the selector and select the default', async () => {
      const fetchFn: FetchJsonFn = jest.fn(async () => ({
        ok: true,
        status: 200,
        json: async () => ({ models: ['gpt-4o-mini', 'gpt-4o'], default_model: 'gpt-4o' }),
      }));
      const view = new ChatView(elements, { typeset, streamChat: jest.fn(), fetchFn });

      await view.loadModels();

      const options = Array.from(elements.modelSelect.options).map((option) => option.value);
      expect(options).toEqual(['gpt-4o-mini', 'gpt-4o']);
      expect(elements.modelSelect.value).toBe('gpt-4o');
      expect(fetchFn).toHaveBeenCalledWith('/models');
    });

    it('should keep the existing options when the request fails', async () => {
      const fetchFn: FetchJsonFn = jest.fn(async () => {
        throw new TypeError('fetch failed');
      });
      const view = new ChatView(elements, { typeset, streamChat: jest.fn(), fetchFn });

      await view.loadModels();

      expect(elements.modelSelect.options).toHaveLength(1);
      expect(elements.modelSelect.value).toBe('gpt-4o-mini');
      expect(console.warn).toHaveBeenCalled();
    });

    it('should reject a response of the wrong shape', async () => {
      const fetchFn: FetchJsonFn = async () => ({
        ok: true,
        status: 200,
        json: async () => ({ models: 'gpt-4o' }),
      });
      const view = new ChatView(elements, { typeset, streamChat: jest.fn(), fetchFn });

      await view.loadModels();

      expect(elements.modelSelect.options).toHaveLength(1);
    });
  });
});
