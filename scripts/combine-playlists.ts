#!/usr/bin/env npx tsx

/**
 * Playlist Combiner
 *
 * Merges the local M3U playlist and JSON channel catalogue into one grouped,
 * deduplicated M3U file.
 *
 * Usage:
 *   npm run combine
 *
 * Environment variables (all optional, also read from .env):
 *   - PLAYLIST_M3U_PATH: input M3U playlist (default YT_playlist.m3u)
 *   - CHANNEL_CATALOG_PATH: input JSON catalogue (default static_channels.json)
 *   - PLAYLIST_OUTPUT_PATH: output file (default combined.m3u)
 *   - EPG_URL: XMLTV guide URL written into the header
 *   - GROUP_ORDER: comma-separated group priority list
 */

import { config } from 'dotenv';

config();

import { createLogger } from '../src/lib/logger';
import {
  combinePlaylists,
  createConsoleReporter,
  loadCombineConfig,
} from '../src/lib/playlist';

const logger = createLogger('PlaylistCombiner');

async function main(): Promise<void> {
  const combineConfig = loadCombineConfig();
  await combinePlaylists({
    ...combineConfig,
    reporter: createConsoleReporter(),
  });
  console.log('\n✨ Done!');
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exitCode = 1;
});
