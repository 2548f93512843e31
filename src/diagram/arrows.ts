import { DIAGRAM_CHARS } from '../constants.js';

/**
 * Marker row for a centered header row.
 *
 * Each non-blank `|`-delimited field gets one marker centered in its span;
 * bars and blank fields become spaces, so the result lines up column for
 * column with the header row. Returns `""` when the row has no fields.
 */
export function arrowify(row: string, marker: string = DIAGRAM_CHARS.ARROW): string {
  const segments = row.split(DIAGRAM_CHARS.BAR);
  if (segments.every((s) => s.trim() === '')) return '';

  return segments
    .map((segment) => {
      if (segment.trim() === '') return DIAGRAM_CHARS.BLANK.repeat(segment.length);
      const left = Math.floor((segment.length - 1) / 2);
      return (
        DIAGRAM_CHARS.BLANK.repeat(left) +
        marker +
        DIAGRAM_CHARS.BLANK.repeat(segment.length - left - 1)
      );
    })
    .join(DIAGRAM_CHARS.BLANK);
}

/**
 * Column index of every marker in an arrow row, left to right.
 * One entry per port of the header row the markers were derived from.
 */
export function markerColumns(arrowRow: string, marker: string = DIAGRAM_CHARS.ARROW): number[] {
  const columns: number[] = [];
  for (let i = 0; i < arrowRow.length; i++) {
    if (arrowRow[i] === marker) columns.push(i);
  }
  return columns;
}
