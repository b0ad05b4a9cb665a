/**
 * Grouping & Ordering
 *
 * Partitions records by group and flattens them group-major, name-minor.
 * Groups named in the priority list come first in list order; the others
 * follow in ascending (case-sensitive) code point order.
 */

import type { ChannelRecord } from './types';

/**
 * Compare by Unicode code point, independent of the host locale
 *
 * Relational operators on strings compare UTF-16 code units, which puts
 * astral characters (surrogate pairs) before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) {
      return ca < cb ? -1 : 1;
    }
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }

  if (i < a.length) return 1;
  if (j < b.length) return -1;
  return 0;
}

/**
 * Case-insensitive name comparison
 */
export function compareNamesCaseInsensitive(a: ChannelRecord, b: ChannelRecord): number {
  return compareCodePoints(a.name.toLowerCase(), b.name.toLowerCase());
}

/**
 * Partition records by group, keeping first-seen order within each group
 */
export function groupByCategory(records: readonly ChannelRecord[]): Map<string, ChannelRecord[]> {
  const groups = new Map<string, ChannelRecord[]>();

  for (const record of records) {
    const bucket = groups.get(record.group);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(record.group, [record]);
    }
  }

  return groups;
}

/**
 * Order group labels: priority groups present in the data first, then the
 * rest sorted ascending
 */
export function orderGroups(present: Iterable<string>, priority: readonly string[]): string[] {
  const presentSet = new Set(present);
  const prioritySet = new Set(priority);

  const leading = priority.filter((group, index) => presentSet.has(group) && priority.indexOf(group) === index);
  const trailing = Array.from(presentSet)
    .filter((group) => !prioritySet.has(group))
    .sort(compareCodePoints);

  return [...leading, ...trailing];
}

/**
 * Flatten records into output order
 *
 * @param records - Deduplicated records
 * @param priority - Group labels to emit first, in order
 */
export function orderRecords(
  records: readonly ChannelRecord[],
  priority: readonly string[]
): ChannelRecord[] {
  const groups = groupByCategory(records);
  const ordered: ChannelRecord[] = [];

  for (const group of orderGroups(groups.keys(), priority)) {
    const bucket = groups.get(group) ?? [];
    ordered.push(...[...bucket].sort(compareNamesCaseInsensitive));
  }

  return ordered;
}
