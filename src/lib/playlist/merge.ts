/**
 * Merge & Dedupe
 *
 * Combines records from every source and keeps the first record per display
 * name. Sources are ordered by ascending rank, so a catalogue entry always
 * beats a playlist entry of the same name.
 */

import type { ChannelRecord } from './types';

export interface DedupeResult {
  records: ChannelRecord[];
  duplicatesRemoved: number;
}

/**
 * Stable sort by ascending source rank
 */
export function sortBySourceRank(records: readonly ChannelRecord[]): ChannelRecord[] {
  return [...records].sort((a, b) => a.sourceRank - b.sourceRank);
}

/**
 * Keep the first record for each exact (case-sensitive) name
 *
 * Later records sharing a name are dropped whole; none of their fields are
 * carried over to the kept record.
 */
export function dedupeByName(records: readonly ChannelRecord[]): DedupeResult {
  const byName = new Map<string, ChannelRecord>();
  let duplicatesRemoved = 0;

  for (const record of records) {
    if (byName.has(record.name)) {
      duplicatesRemoved++;
    } else {
      byName.set(record.name, record);
    }
  }

  return { records: Array.from(byName.values()), duplicatesRemoved };
}

/**
 * Concatenate sources, order by rank and dedupe by name
 */
export function mergeSources(...sources: ReadonlyArray<readonly ChannelRecord[]>): DedupeResult {
  return dedupeByName(sortBySourceRank(sources.flat()));
}
