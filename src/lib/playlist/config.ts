/**
 * Playlist Combiner Configuration
 *
 * Defaults for input/output paths, the EPG guide URL written into the output
 * header, and the priority order of channel groups. Each value can be
 * overridden through environment variables.
 */

/**
 * Group assigned to channels that declare none
 */
export const DEFAULT_GROUP = 'Other';

/**
 * Default file locations, relative to the working directory
 */
export const DEFAULT_PATHS = {
  /** Line-oriented M3U playlist */
  playlist: 'YT_playlist.m3u',
  /** Structured JSON channel catalogue */
  catalog: 'static_channels.json',
  /** Combined output playlist */
  output: 'combined.m3u',
} as const;

/**
 * XMLTV guide referenced twice in the output header (url-tvg and x-tvg-url)
 */
export const DEFAULT_EPG_URL =
  'https://raw.githubusercontent.com/time2shine/IPTV/refs/heads/master/epg.xml';

/**
 * Groups emitted first, in this order. Remaining groups follow alphabetically.
 */
export const DEFAULT_GROUP_ORDER: readonly string[] = [
  'Bangla',
  'Bangla News',
  'International News',
  'India',
  'Pakistan',
  'Educational',
  'Music',
  'International',
  'Travel',
  'Sports',
  'Religious',
  'Kids',
];

/**
 * Banner shown when a run starts
 */
export const PIPELINE_TITLE = 'IPTV Playlist Builder';

/**
 * Error raised for unusable configuration values
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface CombineConfig {
  playlistPath: string;
  catalogPath: string;
  outputPath: string;
  epgUrl: string;
  groupOrder: readonly string[];
}

/**
 * Validate that a URL is an absolute http(s) URL
 */
export function isValidEpgUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Parse a comma-separated group list, dropping blank entries
 */
export function parseGroupOrder(value: string): string[] {
  return value
    .split(',')
    .map((group) => group.trim())
    .filter((group) => group.length > 0);
}

function readPath(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigError(`${key} must not be empty`);
  }
  return trimmed;
}

/**
 * Build the run configuration from environment variables over the defaults
 *
 * Recognized variables: PLAYLIST_M3U_PATH, CHANNEL_CATALOG_PATH,
 * PLAYLIST_OUTPUT_PATH, EPG_URL, GROUP_ORDER (comma-separated).
 */
export function loadCombineConfig(env: NodeJS.ProcessEnv = process.env): CombineConfig {
  const epgUrl = env.EPG_URL?.trim() || DEFAULT_EPG_URL;
  if (!isValidEpgUrl(epgUrl)) {
    throw new ConfigError(`EPG_URL must be an http(s) URL, got "${epgUrl}"`);
  }

  const groupOrder =
    env.GROUP_ORDER !== undefined ? parseGroupOrder(env.GROUP_ORDER) : DEFAULT_GROUP_ORDER;

  return {
    playlistPath: readPath(env, 'PLAYLIST_M3U_PATH', DEFAULT_PATHS.playlist),
    catalogPath: readPath(env, 'CHANNEL_CATALOG_PATH', DEFAULT_PATHS.catalog),
    outputPath: readPath(env, 'PLAYLIST_OUTPUT_PATH', DEFAULT_PATHS.output),
    epgUrl,
    groupOrder,
  };
}
