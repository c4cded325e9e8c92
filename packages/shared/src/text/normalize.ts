import type { DocumentText } from '@fieldwise/contracts';

/**
 * Split embedded line breaks, replace NUL characters, collapse runs of
 * spaces and tabs, and trim each line. Blank lines are kept as `''` since
 * strategies use them as block separators.
 */
export function normalizeLines(input: readonly string[]): string[] {
  const lines: string[] = [];
  for (const raw of input) {
    for (const part of raw.split(/\r\n|\r|\n/)) {
      lines.push(part.replace(/\0/g, ' ').replace(/[ \t\f\v\u00a0]+/g, ' ').trim());
    }
  }
  return lines;
}

/**
 * Build the normalized document view from raw text or pre-split lines.
 */
export function createDocumentText(input: string | readonly string[]): DocumentText {
  const lines = normalizeLines(typeof input === 'string' ? [input] : input);
  return Object.freeze({ lines: Object.freeze(lines), text: lines.join('\n') });
}
