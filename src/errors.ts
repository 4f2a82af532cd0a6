export type SourceLocation = {
  /** File name or other label of the input (e.g. `<stdin>`). */
  source?: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  column?: number;
  /** Raw text of the offending line, appended to the message. */
  lineText?: string;
};

/**
 * Base class of every error raised while mapping a copybook.
 * The message is prefixed with `source:line:column - ` when a location is known.
 */
export class MapperError extends Error {
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation = {}) {
    super(formatMessage(message, location));
    this.name = 'MapperError';
    this.location = location;
  }
}

function formatMessage(message: string, location: SourceLocation): string {
  const parts: string[] = [];
  if (location.source) parts.push(location.source);
  if (typeof location.line === 'number') {
    parts.push(typeof location.column === 'number' ? `${location.line}:${location.column}` : `${location.line}`);
  }
  const prefix = parts.length > 0 ? `${parts.join(':')} - ` : '';
  const lineText = location.lineText?.replace(/\r?\n$/, '');
  return lineText ? `${prefix}${message}\n    ${lineText}` : `${prefix}${message}`;
}

export type VariantFamily = 'record' | 'option';

/** A record or option tag outside the closed set the importer knows. */
export class UnknownVariantError extends MapperError {
  readonly variant: VariantFamily;
  readonly kind: string;

  constructor(variant: VariantFamily, kind: string, location?: SourceLocation) {
    super(variant === 'record' ? `Unknown record type: ${kind}` : `Unknown record option: ${kind}`, location);
    this.name = 'UnknownVariantError';
    this.variant = variant;
    this.kind = kind;
  }
}

/** A recognized clause or record kind that is intentionally not mapped. */
export class UnsupportedFeatureError extends MapperError {
  readonly feature: string;

  constructor(feature: string, location?: SourceLocation) {
    super(`${feature} are not yet supported.`, location);
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
  }
}

export class MalformedInputError extends MapperError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location);
    this.name = 'MalformedInputError';
  }
}

export class CopybookSyntaxError extends MapperError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location);
    this.name = 'CopybookSyntaxError';
  }
}

export class NoInputError extends MapperError {
  constructor() {
    super('No input detected.');
    this.name = 'NoInputError';
  }
}

/** Best-effort description of a tag that failed exhaustive matching. */
export function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) return String(value.kind);
  return String(value);
}
