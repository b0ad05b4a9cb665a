/**
 * M3U Parser
 *
 * Parses line-oriented M3U playlists into channel records. Each #EXTINF
 * metadata line is paired with the next non-comment line as its stream link.
 */

import { createLogger } from '../logger';
import { DEFAULT_GROUP } from './config';
import { readSourceText } from './source-reader';
import { notify, type StatusReporter } from './status-reporter';
import { SOURCE_RANK, type ChannelRecord, type ExtInfTag } from './types';

const logger = createLogger('PlaylistCombiner');

/**
 * Parsed EXTINF metadata line
 */
export interface ParsedExtInf {
  duration: string;
  tags: ExtInfTag[];
  name: string;
}

/**
 * Split EXTINF text into tags, in order
 *
 * Quoted key="value" pairs become attribute tags. Any other text between
 * them (unquoted tags, stray words, broken quotes) is kept as a text tag.
 */
export function parseExtInfTags(str: string): ExtInfTag[] {
  const tags: ExtInfTag[] = [];
  const regex = /([A-Za-z0-9_-]+)="([^"]*)"/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  const pushText = (text: string) => {
    const trimmed = text.trim();
    if (trimmed) {
      tags.push({ kind: 'text', text: trimmed });
    }
  };

  while ((match = regex.exec(str)) !== null) {
    pushText(str.substring(lastIndex, match.index));
    tags.push({ kind: 'attribute', key: match[1], value: match[2] });
    lastIndex = regex.lastIndex;
  }
  pushText(str.substring(lastIndex));

  return tags;
}

/**
 * Value of the first attribute tag with the given key
 */
export function getTagValue(tags: readonly ExtInfTag[], key: string): string | undefined {
  for (const tag of tags) {
    if (tag.kind === 'attribute' && tag.key === key) {
      return tag.value;
    }
  }
  return undefined;
}

/**
 * Parse an EXTINF line
 *
 * The display name is the text after the last comma; tags are read from the
 * text between the duration and that comma.
 */
export function parseExtInfLine(line: string): ParsedExtInf {
  const content = line.replace(/^#EXTINF:?/, '');
  const lastCommaIndex = content.lastIndexOf(',');
  const name = lastCommaIndex >= 0 ? content.substring(lastCommaIndex + 1).trim() : '';
  const beforeComma = lastCommaIndex >= 0 ? content.substring(0, lastCommaIndex) : content;

  const durationMatch = beforeComma.match(/^\s*(-?\d+(?:\.\d+)?)/);
  const rest = durationMatch ? beforeComma.substring(durationMatch[0].length) : beforeComma;

  return {
    duration: durationMatch ? durationMatch[1] : '-1',
    tags: parseExtInfTags(rest),
    name,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function toRecord(extInf: ParsedExtInf, link: string): ChannelRecord {
  return {
    duration: extInf.duration,
    tags: extInf.tags,
    link,
    group: nonEmpty(getTagValue(extInf.tags, 'group-title')) ?? DEFAULT_GROUP,
    id: nonEmpty(getTagValue(extInf.tags, 'tvg-id')),
    logo: nonEmpty(getTagValue(extInf.tags, 'tvg-logo')),
    name: extInf.name,
    sourceRank: SOURCE_RANK.playlist,
  };
}

/**
 * Parse M3U playlist content into channel records, in file order
 *
 * A metadata line that is not followed by a link before the next metadata
 * line is dropped, as is an entry whose display name is empty.
 */
export function parsePlaylist(content: string): ChannelRecord[] {
  const records: ChannelRecord[] = [];
  const lines = content.split(/\r\n|\r|\n/).map((line) => line.trim());

  let pending: ParsedExtInf | null = null;

  for (const line of lines) {
    if (line.startsWith('#EXTINF')) {
      pending = parseExtInfLine(line);
      continue;
    }

    if (!line || line.startsWith('#')) {
      continue;
    }

    if (pending && pending.name) {
      records.push(toRecord(pending, line));
    }
    pending = null;
  }

  return records;
}

/**
 * Read and parse an M3U playlist file. A missing file yields no records.
 */
export async function loadPlaylistFile(
  path: string,
  reporter: StatusReporter
): Promise<ChannelRecord[]> {
  const log = logger.child({ file: path });
  const source = await readSourceText(path);

  if (!source.found) {
    log.debug(`Playlist unavailable (${source.reason}), skipping`);
    notify(reporter, { type: 'source-missing', source: 'playlist', path, reason: source.reason }, log);
    return [];
  }

  const records = parsePlaylist(source.text);
  log.debug(`Parsed ${records.length} channels`);
  return records;
}
