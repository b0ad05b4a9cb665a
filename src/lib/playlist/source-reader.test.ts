/**
 * Source Reader Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { decodeUtf8, readSourceText } from './source-reader';

describe('Source Reader', () => {
  describe('decodeUtf8', () => {
    it('drops a leading byte order mark', () => {
      expect(decodeUtf8(Buffer.from([0xef, 0xbb, 0xbf, 0x41]))).toBe('A');
    });

    it('replaces malformed sequences', () => {
      expect(decodeUtf8(Buffer.from([0x41, 0xc3, 0x42]))).toBe('A\uFFFDB');
    });
  });

  describe('readSourceText', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'source-reader-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads an existing file', async () => {
      const path = join(dir, 'a.txt');
      await writeFile(path, 'Gaan TV');

      expect(await readSourceText(path)).toEqual({ found: true, text: 'Gaan TV' });
    });

    it('reports a missing file as not found', async () => {
      expect(await readSourceText(join(dir, 'missing.txt'))).toEqual({
        found: false,
        reason: 'not found',
      });
    });

    it('reports other read failures with their code', async () => {
      const result = await readSourceText(dir);

      expect(result.found).toBe(false);
      if (!result.found) {
        expect(result.reason.startsWith('EISDIR')).toBe(true);
      }
    });
  });
});
