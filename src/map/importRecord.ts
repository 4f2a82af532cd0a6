import type {
  BasicRecord,
  CopybookRecord,
  OccursOption,
  PictureFormatOption,
  RecordOption,
  SignOption,
} from '../copybook/ast';
import {
  MalformedInputError,
  UnknownVariantError,
  UnsupportedFeatureError,
  describeKind,
} from '../errors';
import type { SourceLocation } from '../errors';
import { createImported } from './imported';
import type { Imported } from './imported';

const INTEGER_RE = /^[+-]?\d+$/;
// levels and literals are 32-bit signed integers
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function locationOf(record: CopybookRecord): SourceLocation {
  if (!record.source) return {};
  return { source: record.source.file, line: record.source.line, lineText: record.source.text };
}

function parseInteger(text: string, what: string, record: CopybookRecord): number {
  const trimmed = text.trim();
  const value = INTEGER_RE.test(trimmed) ? Number.parseInt(trimmed, 10) : NaN;
  if (!(value >= INT32_MIN && value <= INT32_MAX)) {
    throw new MalformedInputError(`Invalid ${what}: '${text}'`, locationOf(record));
  }
  return value;
}

/**
 * Convert one copybook record into a flat attribute bundle.
 * Only plain field records are mapped; renames (66) and condition (88) entries fail.
 */
export function importRecord(record: CopybookRecord): Imported {
  switch (record.kind) {
    case 'basic':
      return importBasicRecord(record);
    case 'renames':
      throw new UnsupportedFeatureError('Renames records', locationOf(record));
    case 'values':
      throw new UnsupportedFeatureError('Values records', locationOf(record));
    default:
      throw new UnknownVariantError('record', describeKind(record));
  }
}

function importBasicRecord(record: BasicRecord): Imported {
  const level = parseInteger(record.level, 'level number', record);
  if (level < 1) {
    throw new MalformedInputError(`Invalid level number: '${record.level}'`, locationOf(record));
  }

  const imported = createImported(level, record.name);
  for (const option of record.options) importOption(option, imported, record);
  return imported;
}

function importOption(option: RecordOption, imported: Imported, record: BasicRecord): void {
  const unsupported = (feature: string): never => {
    throw new UnsupportedFeatureError(feature, locationOf(record));
  };

  switch (option.kind) {
    // supported
    case 'int':
      imported.intValue = parseInteger(option.value, 'integer literal', record);
      return;
    case 'redefines':
      imported.redefines = option.redefined;
      return;
    case 'comp-usage':
      imported.compLevel = parseInteger(option.level, 'comp level', record);
      return;
    case 'sign':
      imported.sign = signText(option);
      return;
    case 'occurs':
      importOccurs(option, imported, record);
      return;
    case 'picture-format':
      importPictureFormat(option, imported, record);
      return;

    // values
    case 'variable':
      return unsupported('Variable value options');
    case 'zero':
      return unsupported('Zero value options');
    case 'space':
      return unsupported('Space value options');
    case 'high-value':
      return unsupported('High value options');
    case 'low-value':
      return unsupported('Low value options');
    case 'all-string':
      return unsupported('AllString value options');
    case 'null':
      return unsupported('Null value options');
    case 'float':
      return unsupported('Float value options');
    case 'string':
      return unsupported('String value options');

    case 'external':
      return unsupported('External options');
    case 'internal':
      return unsupported('Internal options');

    // usages
    case 'index-usage':
      return unsupported('Index usages');
    case 'packed-decimal-usage':
      return unsupported('Packed decimal usages');
    case 'binary-usage':
      return unsupported('Binary usages');
    case 'display-usage':
      return unsupported('Display usages');

    case 'sync':
      return unsupported('Sync options');
    case 'just':
      return unsupported('Just options');
    case 'blank':
      return unsupported('Blank options');
    case 'picture-string':
      return unsupported('Picture string options');

    default:
      throw new UnknownVariantError('option', describeKind(option), locationOf(record));
  }
}

function signText(option: SignOption): string {
  return (
    (option.leading ? 'leading' : 'trailing') +
    (option.separate ? ' separate' + (option.character ? ' character' : '') : '')
  );
}

function importOccurs(option: OccursOption, imported: Imported, record: BasicRecord): void {
  if (option.amount) {
    if (option.amount.kind !== 'int') throw new UnsupportedFeatureError('Identifier amounts', locationOf(record));
    imported.occursAmount = parseInteger(option.amount.value, 'occurs amount', record);
  }
  if (option.upperBound) {
    if (option.upperBound.kind !== 'int') {
      throw new UnsupportedFeatureError('Identifier upper bounds', locationOf(record));
    }
    imported.occursMax = parseInteger(option.upperBound.value, 'occurs upper bound', record);
  }
  if (option.dependsOn !== undefined) imported.occursDependsOn = option.dependsOn;
  if (option.keys.length > 0) throw new UnsupportedFeatureError('Occurs keys', locationOf(record));
  if (option.indexes.length > 0) throw new UnsupportedFeatureError('Occurs indexes', locationOf(record));
}

function importPictureFormat(option: PictureFormatOption, imported: Imported, record: BasicRecord): void {
  const type = option.type.toUpperCase();

  // alphabetic or alphanumeric
  if (type.startsWith('A') || type.startsWith('X')) {
    imported.typeKind = 'string';
    if (option.digits !== undefined) imported.typeLength = parseInteger(option.digits, 'picture length', record);
    return;
  }

  if (type.startsWith('S')) imported.typeSigned = true;
  if (option.decimalType === undefined) {
    imported.typeKind = 'integer';
  } else {
    imported.typeKind = 'float';
    if (option.decimalDigits !== undefined) {
      imported.typeDecimalLength = parseInteger(option.decimalDigits, 'picture decimal length', record);
    }
  }
}
