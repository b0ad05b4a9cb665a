/**
 * Playlist Combiner Module
 *
 * Merges an M3U playlist and a JSON channel catalogue into one ordered M3U.
 */

export {
  // Types
  SOURCE_RANK,
  type ChannelRecord,
  type ExtInfTag,
  type CombineSummary,
  type SourceKind,
  type SourceReadResult,
} from './types';

export {
  // Configuration
  ConfigError,
  DEFAULT_EPG_URL,
  DEFAULT_GROUP,
  DEFAULT_GROUP_ORDER,
  DEFAULT_PATHS,
  loadCombineConfig,
  type CombineConfig,
} from './config';

export {
  // Parsing
  getTagValue,
  parseExtInfLine,
  parseExtInfTags,
  parsePlaylist,
  loadPlaylistFile,
  type ParsedExtInf,
} from './m3u-parser';
export {
  generateTvgId,
  parseChannelCatalog,
  selectOnlineLink,
  loadChannelCatalogFile,
  type CatalogParseResult,
  type SkippedCatalogEntry,
} from './channel-catalog';
export { readSourceText } from './source-reader';

export {
  // Merge & ordering
  dedupeByName,
  mergeSources,
  sortBySourceRank,
  type DedupeResult,
} from './merge';
export {
  compareCodePoints,
  groupByCategory,
  orderGroups,
  orderRecords,
} from './grouping';

export {
  // Output
  PlaylistWriteError,
  formatExtInfLine,
  formatHeaderLine,
  renderPlaylist,
  withTagValue,
  writePlaylistFile,
  type RenderPlaylistOptions,
} from './m3u-writer';

export {
  // Status reporting
  createConsoleReporter,
  silentReporter,
  type PipelineEvent,
  type StatusReporter,
} from './status-reporter';

export { combinePlaylists, type CombineOptions } from './pipeline';
