/**
 * Source Reader
 *
 * Reads an input file as UTF-8 text. A missing or unreadable file is reported
 * as a result value rather than thrown.
 */

import { readFile } from 'node:fs/promises';
import type { SourceReadResult } from './types';

/**
 * Decode bytes as UTF-8, replacing malformed sequences with U+FFFD and
 * dropping a leading byte order mark
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes);
}

function describeReadError(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code === 'ENOENT' ? 'not found' : `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a source file
 *
 * @param path - File path
 * @returns The decoded text, or the reason the file could not be read
 */
export async function readSourceText(path: string): Promise<SourceReadResult> {
  try {
    const bytes = await readFile(path);
    return { found: true, text: decodeUtf8(bytes) };
  } catch (error) {
    return { found: false, reason: describeReadError(error) };
  }
}
