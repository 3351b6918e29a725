/**
 * Greedy word wrap for help text.
 */

const WHITESPACE = /[ \t]/;
const LEADING_WHITESPACE = /^[ \t]+/;

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * Index where the current line should end: the start of the last whitespace
 * run at or before `width`, or -1 when the text has no such break.
 */
function findBreak(text: string, width: number): number {
  for (let i = width; i > 0; i--) {
    if (isWhitespace(text.charAt(i))) {
      let start = i;
      while (start > 0 && isWhitespace(text.charAt(start - 1))) {
        start--;
      }
      return start > 0 ? start : -1;
    }
  }
  return -1;
}

/**
 * Yield the lines of `text` wrapped to `width` columns.
 *
 * Lines break before the last whitespace run that fits. A word longer than
 * `width` is yielded whole on its own line.
 */
export function* wrapLines(width: number, text: string): Generator<string, void, undefined> {
  let rest = text;

  while (rest.length > width) {
    let end = findBreak(rest, width);
    if (end === -1) {
      const tokenEnd = rest.slice(width).search(WHITESPACE);
      if (tokenEnd === -1) {
        yield rest;
        return;
      }
      end = width + tokenEnd;
    }
    yield rest.slice(0, end);
    rest = rest.slice(end).replace(LEADING_WHITESPACE, '');
  }

  if (rest.length > 0) {
    yield rest;
  }
}

export function wrapText(width: number, text: string): string[] {
  return [...wrapLines(width, text)];
}
