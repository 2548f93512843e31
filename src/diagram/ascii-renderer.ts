/**
 * Plain-text step diagram.
 *
 * ```
 * <input connectors>
 * ------------------
 * | adk | design.v |     inputs header
 * ------------------
 * |                |
 * |  4-synthesis   |     step name
 * |                |
 * ------------------
 * |    design.v    |     outputs header
 * ------------------
 * <output connectors>
 * ```
 */

import type { TStepRecord } from '../step/types.js';
import { DIAGRAM_CHARS } from '../constants.js';
import { computeLayout } from './layout.js';
import { arrowify } from './arrows.js';
import { buildInputConnectors, buildOutputConnectors, buildSimpleConnectors } from './connectors.js';
import type { DiagramOptions } from './types.js';

export function renderStepDiagram(step: TStepRecord, options: DiagramOptions = {}): string {
  const layout = computeLayout(step);
  const inputArrows = arrowify(layout.inputsRow);
  const outputArrows = arrowify(layout.outputsRow);

  const above = options.simple
    ? buildSimpleConnectors(inputArrows)
    : buildInputConnectors(inputArrows, step.inputs, step.edgesIn);
  const below = options.simple
    ? buildSimpleConnectors(outputArrows)
    : buildOutputConnectors(outputArrows, step.outputs, step.edgesOut);

  const border = DIAGRAM_CHARS.BORDER.repeat(layout.width);
  const padding =
    DIAGRAM_CHARS.BAR + DIAGRAM_CHARS.BLANK.repeat(Math.max(layout.width - 2, 0)) + DIAGRAM_CHARS.BAR;

  const lines = [
    ...above.map((line) => line.trimEnd()),
    border,
    layout.inputsRow,
    border,
    padding,
    layout.nameRow,
    padding,
    border,
    layout.outputsRow,
    border,
    ...below.map((line) => line.trimEnd()),
  ];

  return lines.join('\n');
}
