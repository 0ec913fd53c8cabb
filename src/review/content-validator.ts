import { MAX_REMOTE_CONTENT_BYTES, NON_TEXT_RATIO } from '../constants.js';

export type ValidationResult = { valid: true } | { valid: false; reason: string };

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;

function isPrintable(codePoint: number): boolean {
  return (
    (codePoint >= 0x20 && codePoint <= 0x7e) ||
    codePoint === TAB ||
    codePoint === LF ||
    codePoint === CR
  );
}

/**
 * Decide whether content can be sent to a chat-completion endpoint.
 * Rules apply in order and the first violation wins.
 */
export function validateContent(content: string): ValidationResult {
  if (content.trim() === '') {
    return { valid: false, reason: 'empty content' };
  }
  if (Buffer.byteLength(content, 'utf-8') > MAX_REMOTE_CONTENT_BYTES) {
    return { valid: false, reason: 'too large for remote call' };
  }
  if (content.includes('\0')) {
    return { valid: false, reason: 'binary content' };
  }
  let total = 0;
  let nonPrintable = 0;
  for (const char of content) {
    total++;
    const codePoint = char.codePointAt(0) ?? 0;
    if (!isPrintable(codePoint)) nonPrintable++;
  }
  if (nonPrintable / total >= NON_TEXT_RATIO) {
    return { valid: false, reason: 'non-text content' };
  }
  return { valid: true };
}
