import { MalformedInputError } from '../errors';
import { addAssociation, createClass, createEmptyModel } from '../model/model';
import type { Model, ModelClass } from '../model/model';
import { isClass, isProperty, multiplicity } from './imported';
import type { Imported, NamedImported } from './imported';

/** Lowest level; pushed lazily so that every real level (1 and up) sits above it. */
const SENTINEL_LEVEL = 0;

/**
 * Rebuilds nesting from level numbers and turns the bundles of one copybook into a Model.
 *
 * Open classes and open levels live on two stacks. Every opened class pushes its level,
 * but an extracted redefinition base is pushed as a class only, so from then on each
 * enclosing class pairs with the level one slot below its own and closes one level later.
 *
 * Single use: feed every bundle through `reduce`, then call `finish` once.
 */
export class HierarchyBuilder {
  private readonly model: Model = createEmptyModel();
  private readonly classes: ModelClass[] = [];
  private readonly levels: number[] = [];
  private finished = false;

  /** Number of classes currently open. */
  get depth(): number {
    return this.classes.length;
  }

  reduce(imported: Imported): void {
    if (this.finished) throw new Error('HierarchyBuilder: reduce() called after finish()');

    this.closeScopes(imported.level);

    if (isClass(imported)) {
      this.openClass(imported);
    } else if (isProperty(imported)) {
      const current = this.current();
      if (!current) throw new MalformedInputError(`Elementary item ${imported.name} is outside of any group`);
      current.properties.push({ name: imported.name, type: imported.typeKind, signed: imported.typeSigned });
    }
    // fillers only take part in scope closure
  }

  /** Finalize every open class (innermost first) and return the model. */
  finish(): Model {
    if (this.finished) throw new Error('HierarchyBuilder: finish() called twice');
    this.finished = true;
    while (this.classes.length > 0) this.finalizeTop();
    this.levels.length = 0;
    return this.model;
  }

  private current(): ModelClass | undefined {
    return this.classes[this.classes.length - 1];
  }

  private topLevel(): number {
    if (this.levels.length === 0) this.levels.push(SENTINEL_LEVEL);
    return this.levels[this.levels.length - 1] ?? SENTINEL_LEVEL;
  }

  // a sibling or shallower item completes every scope opened at its level or deeper
  private closeScopes(level: number): void {
    while (level <= this.topLevel()) {
      this.levels.pop();
      this.finalizeTop();
    }
  }

  private finalizeTop(): void {
    const cls = this.classes.pop();
    if (cls) this.model.classes.push(cls);
  }

  private openClass(imported: NamedImported): void {
    const { name } = imported;
    const current = this.current();

    if (current) {
      if (imported.redefines === undefined) {
        addAssociation(current, name, {
          multiplicity: multiplicity(imported),
          dependsOn: imported.occursDependsOn,
        });
      } else {
        this.extractRedefinedBase(current, imported.redefines);
      }
    }

    this.levels.push(imported.level);
    this.classes.push(createClass(name, imported.redefines));
  }

  /**
   * Only a redefinition of the immediately preceding field is rewritten: that property becomes
   * an association to a base class named after it, opened without a level of its own.
   */
  private extractRedefinedBase(current: ModelClass, redefined: string): void {
    const properties = current.properties;
    const last = properties[properties.length - 1];
    if (!last || last.name !== redefined) return;

    properties.pop();
    addAssociation(current, redefined);
    this.classes.push(createClass(redefined));
  }
}

/** Reduce a whole bundle stream into a model. */
export function buildModel(bundles: Iterable<Imported>): Model {
  const builder = new HierarchyBuilder();
  for (const imported of bundles) builder.reduce(imported);
  return builder.finish();
}
