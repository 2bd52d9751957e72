/**
 * Helpers for the `<reasoning>…</reasoning>` block the policy prompt asks the
 * model to place before its user-facing answer.
 */

const REASONING_PATTERN = /<reasoning>\s*([\s\S]*?)\s*<\/reasoning>/i;
const OPEN_TAG = '<reasoning>';
const CLOSE_TAG = '</reasoning>';

export interface ReasoningSplit {
  reasoning: string | null;
  answer: string;
}

/**
 * Split raw answer text on the first reasoning block (case-insensitive,
 * multiline). Without a block the whole trimmed text is the answer.
 */
export function splitReasoning(content: string): ReasoningSplit {
  if (!content) {
    return { reasoning: null, answer: '' };
  }
  const match = REASONING_PATTERN.exec(content);
  if (!match) {
    return { reasoning: null, answer: content.trim() };
  }
  return {
    reasoning: match[1].trim(),
    answer: content.replace(REASONING_PATTERN, '').trim(),
  };
}

/**
 * Visible answer for a partially streamed text: while a reasoning block is
 * still open, only the text before it is shown.
 */
export function stripReasoningDuringStream(raw: string): string {
  if (!raw) {
    return '';
  }
  const lower = raw.toLowerCase();
  const openAt = lower.indexOf(OPEN_TAG);
  if (openAt >= 0 && !lower.includes(CLOSE_TAG)) {
    return raw.slice(0, openAt).trim();
  }
  return splitReasoning(raw).answer;
}
