import type { Model, ModelAssociation, ModelClass, ModelProperty } from './model';

/**
 * Plain listing of the model, one block per class:
 *
 *   - CLASS : SUPER
 *     - field : signed integer
 *     -> TARGET[1..10](COUNT)
 */
export function renderText(model: Model): string {
  return model.classes.map(renderClass).join('\n');
}

export function renderClass(cls: ModelClass): string {
  const lines = [`- ${cls.name}` + (cls.superclass !== undefined ? ` : ${cls.superclass}` : '')];
  for (const p of cls.properties) lines.push(renderProperty(p));
  for (const a of cls.associations) lines.push(renderAssociation(a));
  return lines.join('\n');
}

export function renderProperty(p: ModelProperty): string {
  return `  - ${p.name} : ${p.signed ? 'signed ' : ''}${p.type}`;
}

export function renderAssociation(a: ModelAssociation): string {
  // depends-on is only shown together with a multiplicity
  if (a.multiplicity === undefined) return `  -> ${a.target}`;
  return `  -> ${a.target}[${a.multiplicity}]` + (a.dependsOn !== undefined ? `(${a.dependsOn})` : '');
}
