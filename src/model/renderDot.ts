import type { Model, ModelClass } from './model';

const HEADER = [
  'digraph G {',
  '  node [',
  '    fontname = "Bitstream Vera Sans"',
  '    fontsize = 10',
  '    shape    = "record"',
  '  ]',
  '',
  '  edge [',
  '    fontname  = "Bitstream Vera Sans"',
  '    fontsize  = 8',
  '    arrowhead = "vee"',
  '  ]',
  '',
];

/** Graphviz node id: copybook names use `-`, which dot does not accept unquoted. */
export function dotId(name: string): string {
  return name.replace(/-/g, '_');
}

function classNode(cls: ModelClass): string[] {
  const props = cls.properties.map((p) => `+ ${p.name} : ${p.signed ? 'signed ' : ''}${p.type}\\l`).join('');
  const lines = [`  ${dotId(cls.name)} [`, `    label = "{${cls.name}|${props}}"`, '  ]'];
  for (const a of cls.associations) {
    if (a.target) lines.push(`  ${dotId(cls.name)} -> ${dotId(a.target)}`);
  }
  lines.push('');
  return lines;
}

/**
 * Render the model as a Graphviz class diagram: association edges use `vee` arrows,
 * generalizations (declared superclasses) use `empty` arrows.
 */
export function renderDot(model: Model): string {
  const lines = [...HEADER];
  for (const cls of model.classes) lines.push(...classNode(cls));

  lines.push('  edge [ arrowhead = empty ]');
  for (const cls of model.classes) {
    if (cls.superclass !== undefined) lines.push(`  ${dotId(cls.name)} -> ${dotId(cls.superclass)}`);
  }
  lines.push('}');
  return lines.join('\n') + '\n';
}
