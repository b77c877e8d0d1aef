/**
 * System prompt for the math tutor
 */

export const SYSTEM_PROMPT =
  'You are a helpful mathematics tutor. Use LaTeX notation for all ' +
  'mathematical expressions. For inline math use $...$ and for display ' +
  'math use $$...$$. Provide clear, step-by-step explanations.';

export function buildMessages(
  message: string
): Array<{ role: 'system' | 'user'; content: string }> {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: message },
  ];
}
