/**
 * Playlist Combiner Pipeline
 *
 * Reads both sources, merges and dedupes them, orders the result by group
 * and name, and writes the combined M3U file. Missing sources contribute no
 * records; only a failed output write is fatal.
 */

import { createLogger } from '../logger';
import { PIPELINE_TITLE, type CombineConfig } from './config';
import { loadChannelCatalogFile } from './channel-catalog';
import { orderRecords } from './grouping';
import { loadPlaylistFile } from './m3u-parser';
import { writePlaylistFile } from './m3u-writer';
import { mergeSources } from './merge';
import { notify, silentReporter, type StatusReporter } from './status-reporter';
import type { CombineSummary } from './types';

const logger = createLogger('PlaylistCombiner');

export interface CombineOptions extends CombineConfig {
  reporter?: StatusReporter;
  /** Millisecond clock used for the elapsed time */
  clock?: () => number;
}

/**
 * Run the combiner once
 *
 * @returns Counts for the run
 * @throws PlaylistWriteError when the output file cannot be written
 */
export async function combinePlaylists(options: CombineOptions): Promise<CombineSummary> {
  const reporter = options.reporter ?? silentReporter;
  const clock = options.clock ?? Date.now;
  const startTime = clock();

  notify(reporter, { type: 'started', title: PIPELINE_TITLE }, logger);

  const playlistRecords = await loadPlaylistFile(options.playlistPath, reporter);
  notify(reporter, { type: 'playlist-loaded', count: playlistRecords.length }, logger);

  const catalogRecords = await loadChannelCatalogFile(options.catalogPath, reporter);
  notify(reporter, { type: 'catalog-loaded', count: catalogRecords.length }, logger);

  const { records, duplicatesRemoved } = mergeSources(catalogRecords, playlistRecords);
  notify(reporter, { type: 'duplicates-removed', count: duplicatesRemoved }, logger);

  const ordered = orderRecords(records, options.groupOrder);

  await writePlaylistFile(options.outputPath, ordered, { epgUrl: options.epgUrl });
  logger.debug(`Wrote ${ordered.length} channels to ${options.outputPath}`);
  notify(reporter, { type: 'output-written', count: ordered.length, path: options.outputPath }, logger);

  const elapsedMs = clock() - startTime;
  notify(reporter, { type: 'finished', elapsedMs }, logger);

  return {
    playlistCount: playlistRecords.length,
    catalogCount: catalogRecords.length,
    duplicatesRemoved,
    outputCount: ordered.length,
    outputPath: options.outputPath,
    elapsedMs,
  };
}
