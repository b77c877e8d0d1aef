/**
 * Turns the accumulated response text of one message into display HTML
 *
 * protect math -> Markdown -> restore math -> sanitize. The typesetting pass
 * runs afterwards on the DOM element (see typeset.ts).
 */

import { Marked } from 'marked';
import DOMPurify from 'dompurify';
import { protectMath, restoreMath } from './mathPlaceholders';

const markdown = new Marked({
  gfm: true,
  breaks: true,
  async: false,
});

/**
 * Synchronous Markdown to HTML conversion
 */
export function renderMarkdown(text: string): string {
  const html = markdown.parse(text);
  if (typeof html !== 'string') {
    throw new Error('Markdown renderer returned a promise; async extensions are not supported');
  }
  return html;
}

/**
 * Renders one message. Pure: the same text always gives the same HTML,
 * so it can run again on every streamed fragment.
 */
export function renderMessageHtml(accumulatedText: string): string {
  const { text, placeholders } = protectMath(accumulatedText);
  const html = restoreMath(renderMarkdown(text), placeholders);
  return DOMPurify.sanitize(html);
}
