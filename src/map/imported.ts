export type TypeKind = 'string' | 'integer' | 'float';

/** Flat attribute bundle extracted from one copybook record. */
export type Imported = {
  level: number;
  /** Absent for fillers. */
  name?: string;
  redefines?: string;
  sign?: string;
  occursAmount: number;
  occursMax: number;
  occursDependsOn?: string;
  typeKind?: TypeKind;
  typeLength: number;
  typeSigned: boolean;
  typeDecimalLength: number;
  // Captured but not used when building the model.
  intValue: number;
  compLevel: number;
};

export function createImported(level: number, name?: string): Imported {
  const imported: Imported = {
    level,
    occursAmount: 0,
    occursMax: 0,
    typeLength: 0,
    typeSigned: false,
    typeDecimalLength: 0,
    intValue: 0,
    compLevel: 0,
  };
  if (name !== undefined) imported.name = name;
  return imported;
}

export type NamedImported = Imported & { name: string };
export type PropertyImported = NamedImported & { typeKind: TypeKind };

export function isFiller(imported: Imported): boolean {
  return imported.name === undefined;
}

/** A named item without a picture opens a nested scope. */
export function isClass(imported: Imported): imported is NamedImported {
  return !isFiller(imported) && imported.typeKind === undefined;
}

export function isProperty(imported: Imported): imported is PropertyImported {
  return !isFiller(imported) && imported.typeKind !== undefined;
}

/**
 * `undefined` when amount and max add up to zero, so an explicit `OCCURS 0`
 * is indistinguishable from no OCCURS clause.
 */
export function multiplicity(imported: Imported): string | undefined {
  if (imported.occursAmount + imported.occursMax === 0) return undefined;
  return `${imported.occursAmount}` + (imported.occursMax > 0 ? `..${imported.occursMax}` : '');
}
