/**
 * KaTeX typesetting pass over rendered message HTML
 */

import * as katex from 'katex';
import { MATH_SPAN_CLASS } from './mathPlaceholders';

export type Typesetter = (element: HTMLElement) => void;

/**
 * Typesets every `span.math-tex` element the render pipeline produced.
 * Nothing else in the element is scanned for delimiters. A malformed
 * formula becomes a KaTeX error span and the remaining spans still render.
 * Spans inside code blocks keep their source text.
 */
export const typesetElement: Typesetter = (element) => {
  const spans = element.querySelectorAll<HTMLElement>(`span.${MATH_SPAN_CLASS}`);

  for (const span of spans) {
    const tex = span.dataset.tex;
    if (tex === undefined || span.closest('pre, code')) {
      continue;
    }

    try {
      katex.render(tex, span, {
        displayMode: span.dataset.display === 'true',
        throwOnError: false,
      });
    } catch (error) {
      console.warn('[Typeset] Math rendering failed', { tex, error });
    }
  }
};
