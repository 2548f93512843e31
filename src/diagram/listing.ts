import type { TParameterScalar, TParameterValue, TStepRecord } from '../step/types.js';
import { LISTING_TITLES, RECOGNIZED_FLAGS } from '../constants.js';

const LIST_ITEM_INDENT = '    ';

function formatScalar(value: TParameterScalar): string {
  return value === null ? 'null' : String(value);
}

function isList(value: TParameterValue): value is readonly TParameterScalar[] {
  return Array.isArray(value);
}

/**
 * Titled key/value list with keys right-aligned to the widest one.
 * List values print as a bare key followed by one indented bullet per item.
 */
function renderSection(title: string, entries: ReadonlyArray<readonly [string, TParameterValue]>): string {
  const lines = [title, ''];
  const keyWidth = Math.max(0, ...entries.map(([key]) => key.length));

  for (const [key, value] of entries) {
    const head = `- ${key.padStart(keyWidth)} :`;
    if (isList(value)) {
      lines.push(head);
      for (const item of value) {
        lines.push(`${LIST_ITEM_INDENT}- ${formatScalar(item)}`);
      }
    } else {
      lines.push(`${head} ${formatScalar(value)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Parameters, flags and source path of a step. Sections whose record key
 * is absent are left out; the source line is always last. Parameters print
 * in map order, each value as its string form.
 */
export function renderListing(step: TStepRecord): string {
  const sections: string[] = [];

  if (step.parameters) {
    sections.push(renderSection(LISTING_TITLES.PARAMETERS, [...step.parameters]));
  }

  const flags: Array<[string, boolean]> = [];
  for (const flag of RECOGNIZED_FLAGS) {
    const value = step[flag];
    if (value !== undefined) flags.push([flag, value]);
  }
  if (flags.length > 0) {
    sections.push(renderSection(LISTING_TITLES.FLAGS, flags));
  }

  sections.push(`${LISTING_TITLES.SOURCE}: ${step.source}`);
  return sections.join('\n\n');
}
