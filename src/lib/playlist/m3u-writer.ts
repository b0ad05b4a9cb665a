/**
 * M3U Writer
 *
 * Renders ordered channel records as an M3U playlist and writes it to disk.
 */

import { open } from 'node:fs/promises';
import type { ChannelRecord, ExtInfTag } from './types';

/**
 * Raised when the output playlist cannot be written
 */
export class PlaylistWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write playlist ${path}: ${reason}`);
    this.name = 'PlaylistWriteError';
    this.path = path;
  }
}

export interface RenderPlaylistOptions {
  /** XMLTV guide URL, written as both url-tvg and x-tvg-url */
  epgUrl: string;
}

/**
 * Build the #EXTM3U header line
 */
export function formatHeaderLine(epgUrl: string): string {
  return `#EXTM3U url-tvg="${epgUrl}" x-tvg-url="${epgUrl}"`;
}

/**
 * Set an attribute on a tag list. Every tag with that key takes the new
 * value in place; when there is none, the attribute is appended.
 */
export function withTagValue(tags: readonly ExtInfTag[], key: string, value: string): ExtInfTag[] {
  let replaced = false;
  const updated = tags.map((tag): ExtInfTag => {
    if (tag.kind === 'attribute' && tag.key === key) {
      replaced = true;
      return { kind: 'attribute', key, value };
    }
    return tag;
  });

  if (!replaced) {
    updated.push({ kind: 'attribute', key, value });
  }
  return updated;
}

function formatTag(tag: ExtInfTag): string {
  return tag.kind === 'attribute' ? `${tag.key}="${tag.value}"` : tag.text;
}

/**
 * Build the #EXTINF line for a record
 *
 * Source tags are written in their original order. tvg-id and tvg-logo take
 * the record's id and logo when those are set.
 */
export function formatExtInfLine(record: ChannelRecord): string {
  let tags: readonly ExtInfTag[] = record.tags;

  if (record.id) {
    tags = withTagValue(tags, 'tvg-id', record.id);
  }
  if (record.logo) {
    tags = withTagValue(tags, 'tvg-logo', record.logo);
  }

  let extinf = `#EXTINF:${record.duration}`;
  for (const tag of tags) {
    extinf += ` ${formatTag(tag)}`;
  }

  return `${extinf},${record.name}`;
}

/**
 * Render the full playlist text; every line ends with a newline
 */
export function renderPlaylist(
  records: readonly ChannelRecord[],
  options: RenderPlaylistOptions
): string {
  const lines = [formatHeaderLine(options.epgUrl)];

  for (const record of records) {
    lines.push(formatExtInfLine(record));
    lines.push(record.link);
  }

  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Write the playlist to a file, replacing any existing content
 *
 * @throws PlaylistWriteError when the file cannot be opened or written
 */
export async function writePlaylistFile(
  path: string,
  records: readonly ChannelRecord[],
  options: RenderPlaylistOptions
): Promise<void> {
  const content = renderPlaylist(records, options);

  try {
    const handle = await open(path, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new PlaylistWriteError(path, error);
  }
}
