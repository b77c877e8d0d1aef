/**
 * Browser entry point, bundled by esbuild into static/build/main.js
 */

import 'katex/dist/katex.min.css';
import { ChatView } from './chatView';

function requireElement<T extends HTMLElement>(id: string, type: new () => T): T {
  const element = document.getElementById(id);
  if (!(element instanceof type)) {
    throw new Error(`Chat page is missing #${id}`);
  }
  return element;
}

document.addEventListener('DOMContentLoaded', () => {
  const view = new ChatView({
    form: requireElement('chat-form', HTMLFormElement),
    input: requireElement('chat-input', HTMLTextAreaElement),
    modelSelect: requireElement('model-select', HTMLSelectElement),
    messages: requireElement('messages', HTMLElement),
    sendButton: requireElement('send-button', HTMLButtonElement),
    stopButton: requireElement('stop-button', HTMLButtonElement),
  });

  view.loadModels().catch((error: unknown) => {
    console.warn('[Main] Model list unavailable', error);
  });
});
