/**
 * java-frontend – Literal decoding
 *
 * Escape processing shared by string, character and text-block literals,
 * and the incidental-whitespace rules for text blocks.
 *
 * License: Apache-2.0
 */

/**
 * Reports an illegal escape. `offset` is relative to the decoded body.
 */
export type EscapeReporter = (offset: number, character: string) => void;

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['b', '\b'],
  ['t', '\t'],
  ['n', '\n'],
  ['f', '\f'],
  ['r', '\r'],
  ['s', ' '],
  ['"', '"'],
  ["'", "'"],
  ['\\', '\\'],
]);

function isOctalDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '7';
}

/**
 * Decode the escapes of a literal body (delimiters already removed).
 *
 * Octal escapes take up to three digits, three only when the first digit
 * is 0-3. With `lineContinuation`, a backslash before a newline removes
 * both. Illegal escapes are reported and kept verbatim.
 */
export function decodeEscapes(
  body: string,
  report: EscapeReporter,
  lineContinuation = false,
): string {
  let out = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      i++;
      continue;
    }

    const next = body[i + 1];
    if (next === undefined) {
      report(i, ch);
      out += ch;
      break;
    }

    const simple = SIMPLE_ESCAPES.get(next);
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    if (isOctalDigit(next)) {
      const maxDigits = next <= '3' ? 3 : 2;
      let j = i + 1;
      while (j < i + 1 + maxDigits && isOctalDigit(body[j])) j++;
      out += String.fromCharCode(parseInt(body.slice(i + 1, j), 8));
      i = j;
      continue;
    }

    if (lineContinuation && next === '\n') {
      i += 2;
      continue;
    }

    report(i + 1, next);
    out += ch + next;
    i += 2;
  }

  return out;
}

/**
 * Content of a text block between its delimiters, with incidental
 * indentation and trailing whitespace removed and escapes processed.
 *
 * Whitespace-only lines do not take part in the common indentation and
 * become empty.
 */
export function processTextBlock(content: string, report: EscapeReporter): string {
  const lines = content.replace(/\r\n?/g, '\n').split('\n');

  let indent = Number.POSITIVE_INFINITY;
  for (const line of lines) {
    if (isBlank(line)) continue;
    indent = Math.min(indent, leadingWhitespace(line));
  }
  if (!Number.isFinite(indent)) indent = 0;

  const stripped = lines.map((line) => (isBlank(line) ? '' : line.slice(indent).trimEnd()));

  return decodeEscapes(stripped.join('\n'), report, true);
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}
