/**
 * Protects LaTeX spans from the Markdown renderer
 *
 * Math spans are swapped for opaque tokens before Markdown conversion and
 * swapped back afterwards, so `_`, `*` and `\\` inside formulas reach the
 * typesetter untouched. This pass alone decides what is math: every span it
 * recognises comes back as its own `span.math-tex` element, and the
 * typesetter renders only those elements.
 */

export const MATH_SPAN_CLASS = 'math-tex';

interface MathPattern {
  regex: RegExp;
  display: boolean;
}

/**
 * Delimiter pairs in match order. Display math goes first so `$$x$$` is
 * never read as `$` + inline `$x$` + `$`.
 */
const MATH_PATTERNS: readonly MathPattern[] = [
  { regex: /\$\$([\s\S]+?)\$\$/g, display: true },
  { regex: /\\\[([\s\S]+?)\\\]/g, display: true },
  // A single $ not touching another $ or preceded by a backslash
  { regex: /(?<![\\$])\$(?!\$)([^$\n]+?)\$(?!\$)/g, display: false },
  { regex: /\\\(([\s\S]+?)\\\)/g, display: false },
];

// Unpaired \( \) \[ \] would otherwise lose their backslash to Markdown escaping
const STRAY_DELIMITER = /\\[()[\]]/g;

const TOKEN_PREFIX = 'MATHPLACEHOLDER';

export type ProtectedSpan =
  | { kind: 'math'; source: string; tex: string; display: boolean }
  | { kind: 'literal'; source: string };

export interface ProtectedText {
  /** Input with every math span replaced by a token */
  text: string;
  /** token -> protected span; `source` includes the delimiters */
  placeholders: ReadonlyMap<string, ProtectedSpan>;
}

/**
 * Picks the smallest nonce whose token prefix does not already occur in the
 * text. Deterministic, so the same input always yields the same tokens.
 */
function chooseNonce(text: string): number {
  let nonce = 0;
  while (text.includes(`${TOKEN_PREFIX}${nonce}X`)) {
    nonce++;
  }
  return nonce;
}

function resolveTokens(span: string, placeholders: ReadonlyMap<string, ProtectedSpan>): string {
  let resolved = span;
  for (const [token, { source }] of placeholders) {
    if (resolved.includes(token)) {
      resolved = resolved.split(token).join(source);
    }
  }
  return resolved;
}

/**
 * Replaces every complete math span with a placeholder token.
 *
 * A delimiter without its closing partner is left in place: while a
 * response is streaming the rest of the span may still arrive.
 */
export function protectMath(input: string): ProtectedText {
  const nonce = chooseNonce(input);
  const placeholders = new Map<string, ProtectedSpan>();
  let text = input;

  const nextToken = () => `${TOKEN_PREFIX}${nonce}X${placeholders.size}END`;

  for (const { regex, display } of MATH_PATTERNS) {
    text = text.replace(regex, (span: string, inner: string) => {
      const token = nextToken();
      // A later pattern can enclose an earlier token, store the real text
      placeholders.set(token, {
        kind: 'math',
        source: resolveTokens(span, placeholders),
        tex: resolveTokens(inner, placeholders),
        display,
      });
      return token;
    });
  }
  text = text.replace(STRAY_DELIMITER, (delimiter: string) => {
    const token = nextToken();
    placeholders.set(token, { kind: 'literal', source: delimiter });
    return token;
  });

  return { text, placeholders };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function mathElement(span: Extract<ProtectedSpan, { kind: 'math' }>): string {
  return (
    `<span class="${MATH_SPAN_CLASS}" data-display="${span.display}" ` +
    `data-tex="${escapeHtml(span.tex)}">${escapeHtml(span.source)}</span>`
  );
}

function replaceTokens(
  fragment: string,
  placeholders: ReadonlyMap<string, ProtectedSpan>,
  render: (span: ProtectedSpan) => string
): string {
  let restored = fragment;
  for (const [token, span] of placeholders) {
    if (restored.includes(token)) {
      restored = restored.split(token).join(render(span));
    }
  }
  return restored;
}

/**
 * Puts the protected spans back into rendered HTML. In text, a math span
 * becomes a `span.math-tex` element whose text is the exact source and
 * whose `data-tex` holds the formula without delimiters. Inside tag markup
 * (a link target, a title) every span goes back as escaped plain text.
 */
export function restoreMath(
  html: string,
  placeholders: ReadonlyMap<string, ProtectedSpan>
): string {
  return html
    .split(/(<[^>]*>)/)
    .map((part) =>
      part.startsWith('<')
        ? replaceTokens(part, placeholders, (span) => escapeHtml(span.source))
        : replaceTokens(part, placeholders, (span) =>
            span.kind === 'math' ? mathElement(span) : escapeHtml(span.source)
          )
    )
    .join('');
}
