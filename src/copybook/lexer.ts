import { CopybookSyntaxError } from '../errors';

export type TokenType = 'word' | 'string' | 'period';

export interface CopybookToken {
  type: TokenType;
  /** Word text as written, string contents without quotes, or `.`. */
  text: string;
  line: number;
  column: number;
  lineText: string;
}

const SEQUENCE_AREA_RE = /^\d{6}/;

function isBlank(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}

/**
 * Fixed-format sources carry a 6-digit sequence area on every line; it is blanked out
 * (keeping columns stable) together with the identification area after column 72.
 */
function normalizeLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  const nonBlank = lines.filter((l) => l.trim() !== '');
  const fixed = nonBlank.length > 0 && nonBlank.every((l) => SEQUENCE_AREA_RE.test(l));
  if (!fixed) return lines;
  return lines.map((l) => (l.trim() === '' ? '' : '      ' + l.slice(6, 72)));
}

export function tokenize(text: string, source?: string): CopybookToken[] {
  const tokens: CopybookToken[] = [];
  const lines = normalizeLines(text);

  lines.forEach((lineText, index) => {
    const line = index + 1;
    const trimmed = lineText.trimStart();
    // comment lines: `*` or `/` indicator
    if (trimmed.startsWith('*') || trimmed.startsWith('/')) return;

    let i = 0;
    while (i < lineText.length) {
      const ch = lineText[i];
      const next = lineText[i + 1];

      if (isBlank(ch) || ((ch === ',' || ch === ';') && isBlank(next))) {
        i++;
        continue;
      }
      if (ch === '*' && next === '>') break;

      const column = i + 1;
      if (ch === "'" || ch === '"') {
        const { value, end } = readString(lineText, i, { source, line, column, lineText });
        tokens.push({ type: 'string', text: value, line, column, lineText });
        i = end;
        continue;
      }
      if (ch === '.' && isBlank(next)) {
        tokens.push({ type: 'period', text: '.', line, column, lineText });
        i++;
        continue;
      }

      let end = i;
      while (end < lineText.length) {
        const c = lineText[end];
        const n = lineText[end + 1];
        if (isBlank(c) || c === "'" || c === '"') break;
        if ((c === '.' || c === ',' || c === ';') && isBlank(n)) break;
        end++;
      }
      tokens.push({ type: 'word', text: lineText.slice(i, end), line, column, lineText });
      i = end;
    }
  });

  return tokens;
}

function readString(
  lineText: string,
  start: number,
  location: { source?: string; line: number; column: number; lineText: string },
): { value: string; end: number } {
  const quote = lineText[start];
  let value = '';
  let i = start + 1;
  while (i < lineText.length) {
    const ch = lineText[i];
    if (ch === quote) {
      // doubled quote escapes itself
      if (lineText[i + 1] === quote) {
        value += quote;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }
  throw new CopybookSyntaxError('Unterminated string literal', location);
}
