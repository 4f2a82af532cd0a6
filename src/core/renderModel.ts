import { modelToIr } from '../ir/modelToIr';
import { serializeIrJson } from '../ir/writeIrJson';
import type { Model } from '../model/model';
import { renderDot } from '../model/renderDot';
import { renderText } from '../model/renderText';

export const OUTPUT_FORMATS = ['text', 'dot', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(v: string): v is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === v);
}

/** Render a model in the given format; the result always ends with a newline. */
export function renderModel(model: Model, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return renderText(model) + '\n';
    case 'dot':
      return renderDot(model);
    case 'json':
      return serializeIrJson(modelToIr(model));
  }
}
