/**
 * Entity graph produced by the hierarchy builder.
 *
 * Links between classes are by name only: association targets and superclasses
 * are not resolved and may name classes that never appear in the model.
 */

export type ModelProperty = {
  name: string;
  /** Logical type label: `string`, `integer` or `float`. */
  type: string;
  signed: boolean;
};

export type ModelAssociation = {
  source: ModelClass;
  target: string;
  /** `"n"` or `"n..m"`. */
  multiplicity?: string;
  dependsOn?: string;
};

export type ModelClass = {
  name: string;
  superclass?: string;
  /** Declaration order. */
  properties: ModelProperty[];
  associations: ModelAssociation[];
};

export type Model = {
  /** Scope-closure order: nested classes precede the classes that contain them. */
  classes: ModelClass[];
};

export function createEmptyModel(): Model {
  return { classes: [] };
}

export function createClass(name: string, superclass?: string): ModelClass {
  const cls: ModelClass = { name, properties: [], associations: [] };
  if (superclass !== undefined) cls.superclass = superclass;
  return cls;
}

export function addAssociation(
  source: ModelClass,
  target: string,
  extra: { multiplicity?: string; dependsOn?: string } = {},
): ModelAssociation {
  const association: ModelAssociation = { source, target };
  if (extra.multiplicity !== undefined) association.multiplicity = extra.multiplicity;
  if (extra.dependsOn !== undefined) association.dependsOn = extra.dependsOn;
  source.associations.push(association);
  return association;
}

/** Names of all classes in the model (for dangling-reference checks). */
export function classNames(model: Model): Set<string> {
  return new Set(model.classes.map((c) => c.name));
}
