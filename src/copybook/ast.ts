/**
 * Copybook record stream: the input of the mapper.
 *
 * Produced by `parseCopybook` or loaded from JSON (`loadRecordsJson`).
 * Numeric operands stay as raw text; the importer parses them.
 */

export type RecordSource = {
  /** File name or `<stdin>`. */
  file?: string;
  /** 1-based line on which the record starts. */
  line: number;
  /** Record text as written (single line, whitespace collapsed). */
  text: string;
};

export type Operand = { kind: 'int'; value: string } | { kind: 'identifier'; name: string };

// Value literals (VALUE clause)
export type IntValue = { kind: 'int'; value: string };
export type FloatValue = { kind: 'float'; value: string };
export type StringValue = { kind: 'string'; value: string };
export type VariableValue = { kind: 'variable'; name: string };
export type AllStringValue = { kind: 'all-string'; value: string };
export type FigurativeValue = { kind: 'zero' | 'space' | 'high-value' | 'low-value' | 'null' };

export type ValueOption =
  | IntValue
  | FloatValue
  | StringValue
  | VariableValue
  | AllStringValue
  | FigurativeValue;

export type RedefinesOption = { kind: 'redefines'; redefined: string };
export type ScopeOption = { kind: 'external' | 'internal' };

export type CompUsage = { kind: 'comp-usage'; level: string };
export type OtherUsage = { kind: 'index-usage' | 'binary-usage' | 'packed-decimal-usage' | 'display-usage' };
export type UsageOption = CompUsage | OtherUsage;

export type SignOption = {
  kind: 'sign';
  leading: boolean;
  separate: boolean;
  character: boolean;
};

export type OccursOption = {
  kind: 'occurs';
  amount?: Operand;
  upperBound?: Operand;
  dependsOn?: string;
  keys: string[];
  indexes: string[];
};

export type LayoutOption = { kind: 'sync' | 'just' | 'blank' };

export type PictureStringOption = { kind: 'picture-string'; picture: string };

/** A picture of the form `(S?9|A|X)[(n)][V9[(n)]]`. */
export type PictureFormatOption = {
  kind: 'picture-format';
  /** Leading type code: `9`, `S9`, `A` or `X`. */
  type: string;
  digits?: string;
  /** `V9` when a decimal part is present. */
  decimalType?: string;
  decimalDigits?: string;
};

export type PictureOption = PictureStringOption | PictureFormatOption;

export type RecordOption =
  | ValueOption
  | RedefinesOption
  | ScopeOption
  | UsageOption
  | SignOption
  | OccursOption
  | LayoutOption
  | PictureOption;

export type RecordOptionKind = RecordOption['kind'];

type RecordBase = {
  level: string;
  /** Absent for FILLER items. */
  name?: string;
  options: RecordOption[];
  source?: RecordSource;
};

export type BasicRecord = RecordBase & { kind: 'basic' };

/** Level 66 entry. */
export type RenamesRecord = RecordBase & { kind: 'renames'; renamed: string; through?: string };

/** Level 88 entry; its literals are carried as value options. */
export type ValuesRecord = RecordBase & { kind: 'values' };

export type CopybookRecord = BasicRecord | RenamesRecord | ValuesRecord;
