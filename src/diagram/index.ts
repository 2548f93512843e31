import type { TStepRecord } from '../step/types.js';
import { loadStepConfig, parseStepConfig } from '../config/loader.js';
import { renderStepDiagram } from './ascii-renderer.js';
import { renderListing } from './listing.js';
import type { DiagramOptions } from './types.js';

export type { DiagramOptions } from './types.js';
export { renderStepDiagram } from './ascii-renderer.js';
export { renderListing } from './listing.js';
export { recenter, buildHeaderRow, computeLayout } from './layout.js';
export type { DiagramLayout } from './layout.js';
export { arrowify, markerColumns } from './arrows.js';
export {
  buildInputConnectors,
  buildOutputConnectors,
  buildSimpleConnectors,
  portsWithEdges,
} from './connectors.js';

/**
 * Render a step record to its diagram followed by its listing.
 */
export function renderStepInfo(step: TStepRecord, options: DiagramOptions = {}): string {
  return `${renderStepDiagram(step, options)}\n\n${renderListing(step)}`;
}

/**
 * Parse configuration text and render it.
 */
export function sourceToStepInfo(content: string, options: DiagramOptions = {}): string {
  return renderStepInfo(parseStepConfig(content), options);
}

/**
 * Load a configuration file and render it.
 */
export function fileToStepInfo(filePath: string, options: DiagramOptions = {}): string {
  return renderStepInfo(loadStepConfig(filePath), options);
}
