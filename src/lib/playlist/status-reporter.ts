/**
 * Status Reporter
 *
 * Notification sink for pipeline progress. The pipeline never reads anything
 * back from a reporter, and a reporter that throws does not affect the run.
 */

import type { Logger } from '../logger';
import type { SourceKind } from './types';

export type PipelineEvent =
  | { type: 'started'; title: string }
  | { type: 'playlist-loaded'; count: number }
  | { type: 'catalog-loaded'; count: number }
  | { type: 'duplicates-removed'; count: number }
  | { type: 'output-written'; count: number; path: string }
  | { type: 'finished'; elapsedMs: number }
  | { type: 'source-missing'; source: SourceKind; path: string; reason: string }
  | { type: 'invalid-source'; source: SourceKind; path: string; reason: string }
  | { type: 'entry-skipped'; source: SourceKind; name: string; reason: string };

export interface StatusReporter {
  report(event: PipelineEvent): void;
}

/**
 * Reporter that discards every event
 */
export const silentReporter: StatusReporter = {
  report: () => undefined,
};

const SOURCE_LABELS: Record<SourceKind, string> = {
  playlist: 'M3U playlist',
  catalog: 'Channel catalogue',
};

/**
 * Format elapsed milliseconds as seconds with two decimals, e.g. "0.42s"
 */
export function formatElapsed(elapsedMs: number): string {
  return `${(elapsedMs / 1000).toFixed(2)}s`;
}

function line(label: string, value: number | string): string {
  return `  ${label.padEnd(28)} ${value}`;
}

/**
 * Render an event as console lines. Returns an empty array for events that
 * produce no output.
 */
export function formatEvent(event: PipelineEvent): string[] {
  switch (event.type) {
    case 'started': {
      const bar = '═'.repeat(event.title.length + 4);
      return [bar, `  ${event.title}`, bar];
    }
    case 'playlist-loaded':
      return [line('M3U channels', event.count)];
    case 'catalog-loaded':
      return [line('Catalogue channels (online)', event.count)];
    case 'duplicates-removed':
      return [line('Duplicates removed', event.count)];
    case 'output-written':
      return [line('Output items', event.count), line('Saved as', event.path)];
    case 'finished':
      return [line('Elapsed', formatElapsed(event.elapsedMs))];
    case 'source-missing':
      return [`  ⚠ ${SOURCE_LABELS[event.source]} ${event.path} unavailable (${event.reason}). Skipping.`];
    case 'invalid-source':
      return [`  ⚠ ${SOURCE_LABELS[event.source]} ${event.path} is invalid (${event.reason}). Skipping.`];
    case 'entry-skipped':
      return [];
  }
}

/**
 * Reporter that prints progress lines to the console
 */
export function createConsoleReporter(
  write: (text: string) => void = (text) => console.log(text)
): StatusReporter {
  return {
    report(event) {
      for (const text of formatEvent(event)) {
        write(text);
      }
    },
  };
}

/**
 * Deliver an event, logging (not rethrowing) reporter failures
 */
export function notify(reporter: StatusReporter, event: PipelineEvent, log: Logger): void {
  try {
    reporter.report(event);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Status reporter failed on "${event.type}" event: ${message}`);
  }
}
