/**
 * Verbatim parameter reading
 *
 * The listing prints parameter values the way the configuration wrote them
 * (`1.0`, `True`, a 20-digit seed), and in the order it wrote them. A plain
 * `YAML.load` loses both: implicit scalars become numbers and booleans, and
 * integer-like keys move to the front of the resulting object.
 *
 * ```
 *   parameters:          YAML.load            readVerbatimParameters
 *     zeta: 1.0    ->    { '10': 2,     ->    Map { zeta => '1.0',
 *     "10": 2              zeta: 1,               10 => '2',
 *     alpha: True          alpha: true }          alpha => 'True' }
 * ```
 */

import * as YAML from 'js-yaml';
import type { TParameterValue } from '../step/types.js';
import { isMapping, parameterMapSchema } from './schema.js';

const PARAMETERS_KEY = 'parameters';

/** Resolves like the core type but constructs the scalar's source text. */
function asSourceText(type: YAML.Type): YAML.Type {
  return new YAML.Type(type.tag, {
    kind: 'scalar',
    resolve: (data: string) => type.resolve(data),
    construct: (data: string) => data,
  });
}

/** Default schema with bool, int and float scalars kept as written. Nulls still load as null. */
export const VERBATIM_SCHEMA = YAML.DEFAULT_SCHEMA.extend({
  implicit: [YAML.types.bool, YAML.types.int, YAML.types.float].map(asSourceText),
});

/** One composed YAML node, as reported by the loader's open/close events. */
interface TNodeEvent {
  kind: string | null;
  result: unknown;
  children: TNodeEvent[];
}

/**
 * Replays the loader's node events into a tree. Children of a mapping node
 * alternate key, value in document order.
 */
function composeEventTree(content: string, filename?: string): { document: unknown; root: TNodeEvent } {
  const root: TNodeEvent = { kind: null, result: undefined, children: [] };
  const stack: TNodeEvent[] = [root];

  const document = YAML.load(content, {
    filename,
    schema: VERBATIM_SCHEMA,
    listener: (eventType, state) => {
      if (eventType === 'open') {
        stack.push({ kind: null, result: undefined, children: [] });
        return;
      }
      const node = stack.pop();
      const parent = stack[stack.length - 1];
      if (node === undefined || parent === undefined) return;
      node.kind = state.kind ?? null;
      node.result = state.result;
      parent.children.push(node);
    },
  });

  return { document, root };
}

function mappingValue(node: TNodeEvent, key: string): TNodeEvent | undefined {
  if (node.kind !== 'mapping') return undefined;
  for (let i = 0; i + 1 < node.children.length; i += 2) {
    if (node.children[i]?.result === key) return node.children[i + 1];
  }
  return undefined;
}

function mappingKeys(node: TNodeEvent): string[] {
  return node.children.filter((_, index) => index % 2 === 0).map((child) => String(child.result));
}

function sameKeySet(ordered: readonly string[], keys: readonly string[]): boolean {
  if (ordered.length !== keys.length) return false;
  const set = new Set(keys);
  return ordered.every((key) => set.has(key));
}

/**
 * Re-read the `parameters` mapping of a configuration with every scalar kept
 * as its source text and its keys in document order.
 *
 * Returns undefined when the document has no (or a null) `parameters` key.
 * Keys that cannot be placed from the node events (merge keys, for one)
 * fall back to object order.
 */
export function readVerbatimParameters(
  content: string,
  filename?: string
): Map<string, TParameterValue> | undefined {
  const { document, root } = composeEventTree(content, filename);
  if (!isMapping(document)) return undefined;

  const raw = document[PARAMETERS_KEY];
  if (raw === undefined || raw === null) return undefined;

  const parameters = parameterMapSchema.parse(raw);
  const keys = Object.keys(parameters);

  const documentNode = root.children[0];
  const node = documentNode === undefined ? undefined : mappingValue(documentNode, PARAMETERS_KEY);
  const ordered = node === undefined ? [] : mappingKeys(node);
  const order = sameKeySet(ordered, keys) ? ordered : keys;

  return new Map(order.map((key): [string, TParameterValue] => [key, parameters[key]]));
}
