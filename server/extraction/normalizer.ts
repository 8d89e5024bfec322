// C0 and C1 controls, minus \t (09), \n (0A) and \r (0D); \r is folded into \n below.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;
const LINE_BREAKS = /\r\n?/g;
const HORIZONTAL_WHITESPACE = /[^\S\n]+/g;
const SPACE_AROUND_NEWLINE = / ?\n ?/g;
const EXCESSIVE_NEWLINES = /\n{3,}/g;

/**
 * Deterministic cleanup applied to every extracted or fetched text.
 *
 * Paragraph breaks survive as a single blank line; everything else collapses to
 * single spaces. Total and idempotent: `normalize(normalize(x)) === normalize(x)`.
 */
export const normalize = (text: string): string =>
  text
    .replace(CONTROL_CHARS, '')
    .replace(LINE_BREAKS, '\n')
    .replace(HORIZONTAL_WHITESPACE, ' ')
    .replace(SPACE_AROUND_NEWLINE, '\n')
    .replace(EXCESSIVE_NEWLINES, '\n\n')
    .trim();
