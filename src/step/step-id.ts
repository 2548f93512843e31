/**
 * Step identifiers carry their build order as a numeric prefix (`"5-foo"`).
 * The prefix is parsed once per identifier and compared as an arbitrary
 * precision integer.
 */

const ORDER_SEPARATOR = '-';

export interface StepId {
  readonly raw: string;
  /** Build order, or null when the identifier has no numeric prefix */
  readonly order: bigint | null;
}

export function parseStepId(raw: string): StepId {
  const sepIndex = raw.indexOf(ORDER_SEPARATOR);
  const prefix = sepIndex === -1 ? raw : raw.slice(0, sepIndex);
  const order = /^\d+$/.test(prefix) ? BigInt(prefix) : null;
  return { raw, order };
}

/**
 * Ascending build order. Unnumbered identifiers sort after numbered ones;
 * equal keys compare as 0 so a stable sort keeps the original order.
 */
export function compareStepIds(a: StepId, b: StepId): number {
  if (a.order === null && b.order === null) return 0;
  if (a.order === null) return 1;
  if (b.order === null) return -1;
  if (a.order === b.order) return 0;
  return a.order < b.order ? -1 : 1;
}

/**
 * Stable sort of items by the build order of the step they reference.
 */
export function sortByStepOrder<T>(items: readonly T[], getStep: (item: T) => string): T[] {
  const keyed = items.map((item, index) => ({ item, index, id: parseStepId(getStep(item)) }));
  keyed.sort((a, b) => compareStepIds(a.id, b.id) || a.index - b.index);
  return keyed.map((k) => k.item);
}
