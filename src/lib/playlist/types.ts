/**
 * Playlist Combiner Types
 *
 * Shared record model for channels coming from either source format.
 */

/**
 * Precedence weight of a source. Lower rank wins on name collisions.
 */
export const SOURCE_RANK = {
  /** Structured JSON channel catalogue */
  catalog: 2,
  /** Line-oriented M3U playlist */
  playlist: 3,
} as const;

export type SourceKind = keyof typeof SOURCE_RANK;

/**
 * One piece of an EXTINF line between the duration and the display name:
 * a quoted key="value" attribute, or any other text kept as written.
 */
export type ExtInfTag =
  | { readonly kind: 'attribute'; readonly key: string; readonly value: string }
  | { readonly kind: 'text'; readonly text: string };

/**
 * One channel entry, normalized from either source.
 */
export interface ChannelRecord {
  /** EXTINF duration token, "-1" for live streams */
  readonly duration: string;
  /** Tags of the metadata line in source order, repeated keys included */
  readonly tags: readonly ExtInfTag[];
  /** Playable stream locator */
  readonly link: string;
  /** Category label */
  readonly group: string;
  /** EPG identifier (tvg-id) */
  readonly id?: string;
  /** Logo URL (tvg-logo) */
  readonly logo?: string;
  /** Display name; dedupe and sort key */
  readonly name: string;
  readonly sourceRank: number;
}

/**
 * Result of reading a source file from disk
 */
export type SourceReadResult =
  | { found: true; text: string }
  | { found: false; reason: string };

/**
 * Counts produced by one pipeline run
 */
export interface CombineSummary {
  playlistCount: number;
  catalogCount: number;
  duplicatesRemoved: number;
  outputCount: number;
  outputPath: string;
  elapsedMs: number;
}
