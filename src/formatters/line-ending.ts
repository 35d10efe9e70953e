/**
 * @arch fmtkit.util
 *
 * Line-ending policy resolution.
 */
import { EOL } from 'node:os';
import type { LineEnding } from '../core/config/schema.js';

export const LINE_SEPARATORS = {
  LF: '\n',
  CRLF: '\r\n',
  CR: '\r',
} as const;

export type FixedLineEnding = keyof typeof LINE_SEPARATORS;

const CRLF_RE = /\r\n/g;
const LONE_CR_RE = /\r(?!\n)/g;
const LONE_LF_RE = /(?<!\r)\n/g;

/**
 * Detect the line ending used in a text.
 * Returns null when the text has no line break or mixes several kinds.
 */
export function detectLineEnding(text: string): FixedLineEnding | null {
  const found: FixedLineEnding[] = [];
  if (CRLF_RE.test(text)) found.push('CRLF');
  if (LONE_CR_RE.test(text)) found.push('CR');
  if (LONE_LF_RE.test(text)) found.push('LF');
  // Global regexes keep state between test() calls
  CRLF_RE.lastIndex = 0;
  LONE_CR_RE.lastIndex = 0;
  LONE_LF_RE.lastIndex = 0;
  return found.length === 1 ? found[0] : null;
}

/**
 * Resolve a policy to the separator written for `source`.
 * AUTO is the platform ending; KEEP is the source's own ending, or AUTO when
 * it has none or is mixed.
 */
export function resolveLineEnding(policy: LineEnding, source: string, platformEol: string = EOL): string {
  switch (policy) {
    case 'LF':
    case 'CRLF':
    case 'CR':
      return LINE_SEPARATORS[policy];
    case 'KEEP': {
      const detected = detectLineEnding(source);
      return detected ? LINE_SEPARATORS[detected] : platformEol;
    }
    case 'AUTO':
      return platformEol;
  }
}

/**
 * Rewrite every line break in `text` with `separator`.
 */
export function applyLineEnding(text: string, separator: string): string {
  return text.replace(/\r\n|\r|\n/g, separator);
}
