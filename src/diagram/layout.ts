import type { TStepRecord } from '../step/types.js';
import { DIAGRAM_CHARS } from '../constants.js';

export interface DiagramLayout {
  /** Shared width of every header row and of the box */
  width: number;
  inputsRow: string;
  nameRow: string;
  outputsRow: string;
}

/**
 * Bar-delimited header row: `["a", "b"]` → `"| a | b |"`. An empty list
 * yields `"|  |"`, which arrowifies to nothing.
 */
export function buildHeaderRow(fields: readonly string[]): string {
  const { BAR } = DIAGRAM_CHARS;
  return `${BAR} ${fields.join(` ${BAR} `)} ${BAR}`;
}

/**
 * Stretch a header row to exactly `width` characters.
 *
 * The row is split into whitespace-separated tokens (bars and field labels)
 * and the spare space is spread evenly over the gaps between them. Whatever
 * does not divide evenly goes just before the closing character, so the
 * first and last characters stay in place and tokens keep their order.
 * A single-token row is returned as is.
 */
export function recenter(row: string, width: number): string {
  const tokens = row.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length <= 1) return row;
  if (width < row.length) {
    throw new RangeError(`Cannot recenter a ${row.length}-character row into ${width} columns`);
  }

  const gaps = tokens.length - 1;
  const extra = width - tokens.reduce((sum, t) => sum + t.length, 0);
  const gap = ' '.repeat(Math.floor(extra / gaps));
  const joined = tokens.join(gap);
  const remainder = ' '.repeat(extra % gaps);

  return joined.slice(0, -1) + remainder + joined.slice(-1);
}

/**
 * Header rows for a step, all centered to the widest of the three.
 */
export function computeLayout(step: Pick<TStepRecord, 'name' | 'inputs' | 'outputs'>): DiagramLayout {
  const inputs = buildHeaderRow(step.inputs);
  const name = buildHeaderRow([step.name]);
  const outputs = buildHeaderRow(step.outputs);
  const width = Math.max(inputs.length, name.length, outputs.length);

  return {
    width,
    inputsRow: recenter(inputs, width),
    nameRow: recenter(name, width),
    outputsRow: recenter(outputs, width),
  };
}
