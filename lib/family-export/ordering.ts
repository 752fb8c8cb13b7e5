import { UNMAPPED_GROUP_RANK } from './constants';
import type { GroupMapping, ParameterRecord } from './types';

/**
 * Sort position of each mapped group: the order of keys in the mapping file.
 */
export function buildGroupRanks(mapping: GroupMapping): Map<string, number> {
  const ranks = new Map<string, number>();
  let index = 0;
  for (const key of mapping.keys()) {
    ranks.set(key, index++);
  }
  return ranks;
}

const nameCollator = new Intl.Collator('ru', { sensitivity: 'variant' });

// Culture-aware and case-sensitive; code units break the remaining ties
function compareNames(a: string, b: string): number {
  const byCulture = nameCollator.compare(a, b);
  if (byCulture !== 0) return byCulture;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order records by group rank, then by name.
 * Groups missing from the mapping go last. Returns a new array.
 */
export function orderParameters(
  records: readonly ParameterRecord[],
  mapping: GroupMapping
): ParameterRecord[] {
  const ranks = buildGroupRanks(mapping);
  const rankOf = (group: string) => ranks.get(group) ?? UNMAPPED_GROUP_RANK;

  return [...records].sort(
    (a, b) => rankOf(a.group) - rankOf(b.group) || compareNames(a.name, b.name)
  );
}
