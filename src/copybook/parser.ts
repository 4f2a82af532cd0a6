/**
 * Copybook text parser.
 *
 * Recognizes data description entries and the clauses the importer knows about.
 * It keeps the clauses as written; deciding which ones can be mapped is the importer's job.
 */

import { CopybookSyntaxError } from '../errors';
import type {
  CopybookRecord,
  OccursOption,
  Operand,
  PictureFormatOption,
  PictureOption,
  RecordOption,
  RecordSource,
  SignOption,
  UsageOption,
  ValueOption,
} from './ast';
import { tokenize } from './lexer';
import type { CopybookToken } from './lexer';

export type ParseCopybookOptions = {
  /** File name used in error messages and record sources. */
  source?: string;
};

const LEVEL_RE = /^\d{1,2}$/;
const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?\d*\.\d+$/;
const COMP_RE = /^COMP(?:UTATIONAL)?(?:-(\d+))?$/;
// sign, symbol, repeats of the symbol, (count), V + nines, (count)
const PICTURE_FORMAT_RE = /^(S?)([9AX])(\2*)(?:\((\d+)\))?(?:V(9+)(?:\((\d+)\))?)?$/;

/** Words that start a clause (and therefore end a name list). */
const CLAUSE_KEYWORDS = new Set([
  'REDEFINES',
  'EXTERNAL',
  'GLOBAL',
  'USAGE',
  'BINARY',
  'PACKED-DECIMAL',
  'DISPLAY',
  'INDEX',
  'SIGN',
  'LEADING',
  'TRAILING',
  'OCCURS',
  'ASCENDING',
  'DESCENDING',
  'INDEXED',
  'SYNC',
  'SYNCHRONIZED',
  'JUST',
  'JUSTIFIED',
  'BLANK',
  'PIC',
  'PICTURE',
  'VALUE',
  'VALUES',
  'RENAMES',
]);

function isClauseKeyword(word: string): boolean {
  return CLAUSE_KEYWORDS.has(word) || COMP_RE.test(word);
}

export function parseCopybook(text: string, options: ParseCopybookOptions = {}): CopybookRecord[] {
  return new CopybookParser(tokenize(text, options.source), options.source).parse();
}

export class CopybookParser {
  private pos = 0;

  constructor(
    private readonly tokens: CopybookToken[],
    private readonly source?: string,
  ) {}

  parse(): CopybookRecord[] {
    const records: CopybookRecord[] = [];
    while (this.pos < this.tokens.length) records.push(this.parseEntry());
    return records;
  }

  private parseEntry(): CopybookRecord {
    const first = this.pos;
    const levelToken = this.expectWord('level number');
    if (!LEVEL_RE.test(levelToken.text)) this.fail(`Expected level number, found '${levelToken.text}'`, levelToken);
    const level = levelToken.text;

    let name: string | undefined;
    const nameToken = this.peek();
    if (nameToken && nameToken.type === 'word' && !isClauseKeyword(upper(nameToken))) {
      this.pos++;
      if (upper(nameToken) !== 'FILLER') name = nameToken.text;
    }

    let record: CopybookRecord;
    if (level === '66') {
      record = { kind: 'renames', level, options: [], ...this.parseRenames() };
    } else if (level === '88') {
      record = { kind: 'values', level, options: this.parseConditionValues() };
    } else {
      record = { kind: 'basic', level, options: this.parseClauses() };
    }
    if (name !== undefined) record.name = name;

    this.expectPeriod();
    record.source = this.sourceOf(first);
    return record;
  }

  private parseRenames(): { renamed: string; through?: string } {
    this.expectKeyword('RENAMES');
    const renamed = this.expectWord('renamed item').text;
    if (this.acceptKeyword('THRU', 'THROUGH')) {
      return { renamed, through: this.expectWord('renamed item').text };
    }
    return { renamed };
  }

  private parseConditionValues(): ValueOption[] {
    this.expectKeyword('VALUE', 'VALUES');
    this.acceptKeyword('IS', 'ARE');
    const values: ValueOption[] = [];
    while (!this.atPeriod()) {
      values.push(this.parseLiteral());
      if (this.acceptKeyword('THRU', 'THROUGH')) values.push(this.parseLiteral());
    }
    if (values.length === 0) this.fail('Expected literal');
    return values;
  }

  private parseClauses(): RecordOption[] {
    const options: RecordOption[] = [];
    while (!this.atPeriod()) options.push(...this.parseClause());
    return options;
  }

  private parseClause(): RecordOption[] {
    const token = this.expectWord('clause');
    const word = upper(token);

    switch (word) {
      case 'REDEFINES':
        return [{ kind: 'redefines', redefined: this.expectWord('redefined item').text }];
      case 'EXTERNAL':
        return [{ kind: 'external' }];
      case 'GLOBAL':
        return [{ kind: 'internal' }];
      case 'USAGE':
        this.acceptKeyword('IS');
        return [this.parseUsage(this.expectWord('usage'))];
      case 'SIGN':
        this.acceptKeyword('IS');
        return [this.parseSign(this.expectWord('LEADING or TRAILING'))];
      case 'LEADING':
      case 'TRAILING':
        return [this.parseSign(token)];
      case 'OCCURS':
        return [this.parseOccurs()];
      case 'SYNC':
      case 'SYNCHRONIZED':
        this.acceptKeyword('LEFT', 'RIGHT');
        return [{ kind: 'sync' }];
      case 'JUST':
      case 'JUSTIFIED':
        this.acceptKeyword('RIGHT');
        return [{ kind: 'just' }];
      case 'BLANK':
        this.acceptKeyword('WHEN');
        this.expectKeyword('ZERO', 'ZEROS', 'ZEROES');
        return [{ kind: 'blank' }];
      case 'PIC':
      case 'PICTURE':
        this.acceptKeyword('IS');
        return [parsePicture(this.expectWord('picture string').text)];
      case 'VALUE':
        this.acceptKeyword('IS');
        return [this.parseLiteral()];
      default:
        return [this.parseUsage(token)];
    }
  }

  private parseUsage(token: CopybookToken): UsageOption {
    const word = upper(token);
    const comp = COMP_RE.exec(word);
    if (comp) return { kind: 'comp-usage', level: comp[1] ?? '0' };
    switch (word) {
      case 'BINARY':
        return { kind: 'binary-usage' };
      case 'PACKED-DECIMAL':
        return { kind: 'packed-decimal-usage' };
      case 'DISPLAY':
        return { kind: 'display-usage' };
      case 'INDEX':
        return { kind: 'index-usage' };
      default:
        return this.fail(`Unexpected '${token.text}'`, token);
    }
  }

  private parseSign(token: CopybookToken): SignOption {
    const word = upper(token);
    if (word !== 'LEADING' && word !== 'TRAILING') this.fail(`Expected LEADING or TRAILING, found '${token.text}'`, token);
    const separate = this.acceptKeyword('SEPARATE');
    const character = separate && this.acceptKeyword('CHARACTER');
    return { kind: 'sign', leading: word === 'LEADING', separate, character };
  }

  private parseOccurs(): OccursOption {
    const option: OccursOption = { kind: 'occurs', amount: this.parseOperand(), keys: [], indexes: [] };
    if (this.acceptKeyword('TO')) option.upperBound = this.parseOperand();
    this.acceptKeyword('TIMES');
    if (this.acceptKeyword('DEPENDING')) {
      this.acceptKeyword('ON');
      option.dependsOn = this.expectWord('depending item').text;
    }
    for (;;) {
      if (this.acceptKeyword('ASCENDING', 'DESCENDING')) {
        this.acceptKeyword('KEY');
        this.acceptKeyword('IS');
        option.keys.push(...this.parseNames('key'));
      } else if (this.acceptKeyword('INDEXED')) {
        this.acceptKeyword('BY');
        option.indexes.push(...this.parseNames('index'));
      } else {
        return option;
      }
    }
  }

  private parseOperand(): Operand {
    const token = this.expectWord('occurs amount');
    return INTEGER_RE.test(token.text) ? { kind: 'int', value: token.text } : { kind: 'identifier', name: token.text };
  }

  private parseNames(what: string): string[] {
    const names = [this.expectWord(what).text];
    for (let t = this.peek(); t && t.type === 'word' && !isClauseKeyword(upper(t)); t = this.peek()) {
      names.push(t.text);
      this.pos++;
    }
    return names;
  }

  private parseLiteral(): ValueOption {
    const token = this.next('literal');
    if (token.type === 'string') return { kind: 'string', value: token.text };
    if (token.type === 'period') return this.fail('Expected literal', token);

    const word = upper(token);
    switch (word) {
      case 'ZERO':
      case 'ZEROS':
      case 'ZEROES':
        return { kind: 'zero' };
      case 'SPACE':
      case 'SPACES':
        return { kind: 'space' };
      case 'HIGH-VALUE':
      case 'HIGH-VALUES':
        return { kind: 'high-value' };
      case 'LOW-VALUE':
      case 'LOW-VALUES':
        return { kind: 'low-value' };
      case 'NULL':
      case 'NULLS':
        return { kind: 'null' };
      case 'ALL': {
        const literal = this.next('literal');
        return { kind: 'all-string', value: literal.text };
      }
    }
    if (INTEGER_RE.test(token.text)) return { kind: 'int', value: token.text };
    if (DECIMAL_RE.test(token.text)) return { kind: 'float', value: token.text };
    return { kind: 'variable', name: token.text };
  }

  // token helpers

  private peek(): CopybookToken | undefined {
    return this.tokens[this.pos];
  }

  private next(what: string): CopybookToken {
    const token = this.peek();
    if (!token) return this.fail(`Unexpected end of input, expected ${what}`);
    this.pos++;
    return token;
  }

  private expectWord(what: string): CopybookToken {
    const token = this.next(what);
    if (token.type !== 'word') this.fail(`Expected ${what}, found '${token.text}'`, token);
    return token;
  }

  private expectKeyword(...keywords: string[]): CopybookToken {
    const token = this.expectWord(keywords.join(' or '));
    if (!keywords.includes(upper(token))) this.fail(`Expected ${keywords.join(' or ')}, found '${token.text}'`, token);
    return token;
  }

  private acceptKeyword(...keywords: string[]): boolean {
    const token = this.peek();
    if (!token || token.type !== 'word' || !keywords.includes(upper(token))) return false;
    this.pos++;
    return true;
  }

  private atPeriod(): boolean {
    const token = this.peek();
    if (!token) return this.fail('Missing period at end of entry');
    return token.type === 'period';
  }

  private expectPeriod(): void {
    const token = this.next('period');
    if (token.type !== 'period') this.fail(`Expected period, found '${token.text}'`, token);
  }

  private sourceOf(first: number): RecordSource {
    const entry = this.tokens.slice(first, this.pos);
    const text = entry
      .map((t) => (t.type === 'string' ? `'${t.text.replace(/'/g, "''")}'` : t.text))
      .join(' ')
      .replace(/ \.$/, '.');
    const source: RecordSource = { line: entry[0]?.line ?? 0, text };
    if (this.source !== undefined) source.file = this.source;
    return source;
  }

  private fail(message: string, token?: CopybookToken): never {
    const at = token ?? this.tokens[this.tokens.length - 1];
    throw new CopybookSyntaxError(message, {
      source: this.source,
      line: at?.line,
      column: at?.column,
      lineText: at?.lineText,
    });
  }
}

function upper(token: CopybookToken): string {
  return token.text.toUpperCase();
}

export function parsePicture(picture: string): PictureOption {
  const match = PICTURE_FORMAT_RE.exec(picture.toUpperCase());
  if (!match) return { kind: 'picture-string', picture };
  const [, sign, symbol, repeats, count, nines, decimalCount] = match;
  if (sign === 'S' && symbol !== '9') return { kind: 'picture-string', picture };

  const option: PictureFormatOption = { kind: 'picture-format', type: `${sign}${symbol}` };
  const digits = pictureDigits(1 + repeats.length, count);
  if (digits !== undefined) option.digits = digits;
  if (nines !== undefined) {
    option.decimalType = 'V9';
    const decimalDigits = pictureDigits(nines.length, decimalCount);
    if (decimalDigits !== undefined) option.decimalDigits = decimalDigits;
  }
  return option;
}

/**
 * Digit count of `symbols` repeated symbols optionally followed by `(count)`:
 * `9(5)` is 5, `99(3)` is 4, `999` is 3; a lone symbol has no count.
 */
function pictureDigits(symbols: number, count: string | undefined): string | undefined {
  if (count === undefined) return symbols > 1 ? String(symbols) : undefined;
  return symbols > 1 ? String(symbols - 1 + Number.parseInt(count, 10)) : count;
}
