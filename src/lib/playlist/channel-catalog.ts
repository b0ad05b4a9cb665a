/**
 * Channel Catalogue Parser
 *
 * Parses the structured JSON catalogue: an object keyed by channel name whose
 * values carry an optional group, tvg_id, tvg_logo and a list of endpoints
 * ({ url, status }). Only the first endpoint with status "online" is used.
 */

import { createLogger } from '../logger';
import { DEFAULT_GROUP } from './config';
import { readSourceText } from './source-reader';
import { notify, type StatusReporter } from './status-reporter';
import { SOURCE_RANK, type ChannelRecord } from './types';

const logger = createLogger('PlaylistCombiner');

export const ONLINE_STATUS = 'online';

/**
 * Catalogue entry that produced no record
 */
export interface SkippedCatalogEntry {
  name: string;
  reason: string;
}

export type CatalogParseResult =
  | { ok: true; records: ChannelRecord[]; skipped: SkippedCatalogEntry[] }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Derive a tvg-id from a display name: trimmed, with every character outside
 * [A-Za-z0-9_] replaced by an underscore
 */
export function generateTvgId(name: string): string {
  return name.trim().replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * URL of the first endpoint whose status is "online"
 *
 * @returns The URL, or null when no endpoint is online or the first online
 *   endpoint has no usable URL
 */
export function selectOnlineLink(links: unknown): string | null {
  if (!Array.isArray(links)) return null;

  const online = links.find(
    (link): link is Record<string, unknown> => isRecord(link) && link.status === ONLINE_STATUS
  );
  if (!online) return null;

  return nonEmptyString(online.url) ?? null;
}

/**
 * Parse catalogue JSON into channel records, in key order
 *
 * Blank content parses to an empty catalogue. Invalid JSON, or a top level
 * that is not an object, is reported through the result.
 */
export function parseChannelCatalog(content: string): CatalogParseResult {
  if (!content.trim()) {
    return { ok: true, records: [], skipped: [] };
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'Invalid JSON' };
  }

  if (!isRecord(data)) {
    return { ok: false, reason: 'top level must be an object keyed by channel name' };
  }

  const records: ChannelRecord[] = [];
  const skipped: SkippedCatalogEntry[] = [];

  for (const [name, info] of Object.entries(data)) {
    if (!name.trim()) {
      skipped.push({ name, reason: 'blank channel name' });
      continue;
    }
    if (!isRecord(info)) {
      skipped.push({ name, reason: 'entry is not an object' });
      continue;
    }

    const link = selectOnlineLink(info.links);
    if (!link) {
      skipped.push({ name, reason: 'no online endpoint' });
      continue;
    }

    const group = typeof info.group === 'string' ? info.group : DEFAULT_GROUP;

    records.push({
      duration: '-1',
      tags: [{ kind: 'attribute', key: 'group-title', value: group }],
      link,
      group,
      id: nonEmptyString(info.tvg_id) ?? generateTvgId(name),
      logo: nonEmptyString(info.tvg_logo),
      name,
      sourceRank: SOURCE_RANK.catalog,
    });
  }

  return { ok: true, records, skipped };
}

/**
 * Read and parse a catalogue file. A missing or invalid file yields no
 * records.
 */
export async function loadChannelCatalogFile(
  path: string,
  reporter: StatusReporter
): Promise<ChannelRecord[]> {
  const log = logger.child({ file: path });
  const source = await readSourceText(path);

  if (!source.found) {
    log.debug(`Channel catalogue unavailable (${source.reason}), skipping`);
    notify(reporter, { type: 'source-missing', source: 'catalog', path, reason: source.reason }, log);
    return [];
  }

  const result = parseChannelCatalog(source.text);

  if (!result.ok) {
    log.debug(`Channel catalogue is invalid: ${result.reason}`);
    notify(reporter, { type: 'invalid-source', source: 'catalog', path, reason: result.reason }, log);
    return [];
  }

  for (const entry of result.skipped) {
    log.debug(`Skipped catalogue entry "${entry.name}": ${entry.reason}`);
    notify(reporter, { type: 'entry-skipped', source: 'catalog', ...entry }, log);
  }

  log.debug(`Parsed ${result.records.length} channels`);

  return result.records;
}
