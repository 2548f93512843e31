/**
 * Connector stacks drawn above (inputs) and below (outputs) the step box.
 *
 * Each port with edges gets a vertical trunk in its column; every remote
 * step it connects to is named by a pair of label lines to the right of
 * the diagram (remote step, then remote port):
 *
 * ```
 *   +           1-foo        ◄─ input port 0, producer label pair
 *   +           a
 *   |                        ◄─ continuation
 *   |       +   2-bar        ◄─ input port 2
 *   |       +   c
 *   |       |
 *   V       V                ◄─ adjacent to the box
 *   ---------
 *   ...
 *   ---------
 *   V   |                    ◄─ first consumer of output port 0
 *   +   |       5-foo
 *   +   |       x
 *   +   |                    ◄─ next consumer of the same port
 *   +   |       6-bar
 *   +   |       x
 *       V                    ◄─ output port 1
 *       +       7-baz
 *       +       y
 * ```
 *
 * Inputs are read top-down toward the box, so trunks of ports already
 * labelled keep running down past later ports. Outputs are read top-down
 * away from the box, so trunks of ports still to be labelled run down past
 * earlier ones.
 */

import type { TEdgeMap, TEdgeRef } from '../step/types.js';
import { sortByStepOrder } from '../step/step-id.js';
import { DIAGRAM_CHARS } from '../constants.js';
import { markerColumns } from './arrows.js';
import { ColumnBuffer } from './column-buffer.js';

function edgesOf(edges: TEdgeMap, port: string): readonly TEdgeRef[] {
  return Object.hasOwn(edges, port) ? edges[port] : [];
}

function portColumns(arrowRow: string, ports: readonly string[]): number[] {
  const columns = markerColumns(arrowRow);
  if (columns.length !== ports.length) {
    throw new Error(
      `Arrow row has ${columns.length} port column(s) but ${ports.length} port(s) are declared`
    );
  }
  return columns;
}

/**
 * Per-port flag: does the port have at least one edge?
 */
export function portsWithEdges(ports: readonly string[], edges: TEdgeMap): boolean[] {
  return ports.map((port) => edgesOf(edges, port).length > 0);
}

function label(row: string, text: string): string {
  return `${row}${DIAGRAM_CHARS.BLANK}${text}`;
}

/**
 * Lines above the box, top to bottom. Ports are visited in declared order;
 * each producer edge yields two label lines and a continuation line. The
 * last line carries a marker in every column that has edges and is always
 * present.
 */
export function buildInputConnectors(
  arrowRow: string,
  ports: readonly string[],
  edges: TEdgeMap
): string[] {
  const columns = portColumns(arrowRow, ports);
  const exists = portsWithEdges(ports, edges);
  const buffer = new ColumnBuffer(arrowRow.length, columns);
  exists.forEach((has, port) => {
    if (has) buffer.set(port, 'pending');
  });

  const lines: string[] = [];
  ports.forEach((port, i) => {
    if (!exists[i]) return;

    const labelRow = buffer.set(i, 'branch').render();
    const continuation = buffer.set(i, 'trunk').render();
    for (const ref of edgesOf(edges, port)) {
      lines.push(label(labelRow, ref.step), label(labelRow, ref.f), continuation);
    }
  });

  const adjacent = new ColumnBuffer(arrowRow.length, columns);
  exists.forEach((has, port) => {
    if (has) adjacent.set(port, 'arrow');
  });
  lines.push(adjacent.render());

  return lines;
}

/**
 * Lines below the box, top to bottom. Ports are visited in declared order
 * and each port's consumers in ascending build order. The first consumer
 * line of a port carries its arrow, later ones a plain branch, and each is
 * followed by the consumer's two label lines.
 */
export function buildOutputConnectors(
  arrowRow: string,
  ports: readonly string[],
  edges: TEdgeMap
): string[] {
  const columns = portColumns(arrowRow, ports);
  const exists = portsWithEdges(ports, edges);
  const buffer = new ColumnBuffer(arrowRow.length, columns);
  exists.forEach((has, port) => {
    if (has) buffer.set(port, 'trunk');
  });

  const lines: string[] = [];
  ports.forEach((port, i) => {
    if (!exists[i]) return;

    const consumers = sortByStepOrder(edgesOf(edges, port), (ref) => ref.step);
    const arrowLine = buffer.set(i, 'arrow').render();
    const labelRow = buffer.set(i, 'branch').render();
    consumers.forEach((ref, k) => {
      lines.push(k === 0 ? arrowLine : labelRow, label(labelRow, ref.step), label(labelRow, ref.f));
    });

    buffer.set(i, 'absent');
  });

  return lines;
}

/**
 * Generic connectors that ignore edges: a trunk row then a marker row, one
 * mark per port. Empty rows when the side has no ports.
 */
export function buildSimpleConnectors(arrowRow: string): string[] {
  return [arrowRow.split(DIAGRAM_CHARS.ARROW).join(DIAGRAM_CHARS.TRUNK), arrowRow];
}
