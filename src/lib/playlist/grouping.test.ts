/**
 * Grouping & Ordering Tests
 */

import { describe, expect, it } from 'vitest';
import { compareCodePoints, groupByCategory, orderGroups, orderRecords } from './grouping';
import type { ChannelRecord } from './types';

function createRecord(name: string, group: string, link = `http://example.com/${name}`): ChannelRecord {
  return { duration: '-1', tags: [], link, group, name, sourceRank: 3 };
}

describe('Grouping & Ordering', () => {
  describe('compareCodePoints', () => {
    it('orders astral characters after the rest of the BMP', () => {
      expect(compareCodePoints('a\uE000', 'a\u{1F600}')).toBe(-1);
      expect(compareCodePoints('a\u{1F600}', 'a\uFFFD')).toBe(1);
    });

    it('orders a prefix first', () => {
      expect(compareCodePoints('ab', 'abc')).toBe(-1);
      expect(compareCodePoints('\u{1F600}x', '\u{1F600}')).toBe(1);
      expect(compareCodePoints('News', 'News')).toBe(0);
    });
  });

  describe('groupByCategory', () => {
    it('partitions records keeping first-seen order', () => {
      const groups = groupByCategory([
        createRecord('a', 'Music'),
        createRecord('b', 'News'),
        createRecord('c', 'Music'),
      ]);

      expect(Array.from(groups.keys())).toEqual(['Music', 'News']);
      expect(groups.get('Music')?.map((r) => r.name)).toEqual(['a', 'c']);
    });
  });

  describe('orderGroups', () => {
    it('puts priority groups first, then the rest alphabetically', () => {
      expect(orderGroups(['Music', 'ZZZ', 'Bangla'], ['Bangla', 'Music'])).toEqual([
        'Bangla',
        'Music',
        'ZZZ',
      ]);
    });

    it('skips priority groups absent from the data', () => {
      expect(orderGroups(['Kids', 'Other'], ['Bangla', 'Kids', 'Music'])).toEqual(['Kids', 'Other']);
    });

    it('sorts non-priority groups case-sensitively', () => {
      expect(orderGroups(['beta', 'Alpha', 'Zulu'], [])).toEqual(['Alpha', 'Zulu', 'beta']);
    });

    it('matches priority labels exactly', () => {
      expect(orderGroups(['music', 'Zeta'], ['Music'])).toEqual(['Zeta', 'music']);
    });

    it('emits a repeated priority label once', () => {
      expect(orderGroups(['Music', 'Bangla'], ['Music', 'Bangla', 'Music'])).toEqual(['Music', 'Bangla']);
    });
  });

  describe('orderRecords', () => {
    it('sorts names and groups by code point', () => {
      const ordered = orderRecords(
        [
          createRecord('\u{1F4FA} TV', '\u{1F3B5}'),
          createRecord('\uFF21 TV', '\u{1F3B5}'),
          createRecord('x', '\uFF2D'),
        ],
        []
      );

      expect(ordered.map((r) => r.name)).toEqual(['x', '\uFF21 TV', '\u{1F4FA} TV']);
    });

    it('orders group-major, name-minor', () => {
      const ordered = orderRecords(
        [
          createRecord('z1', 'ZZZ'),
          createRecord('m1', 'Music'),
          createRecord('b1', 'Bangla'),
        ],
        ['Bangla', 'Music']
      );

      expect(ordered.map((r) => r.group)).toEqual(['Bangla', 'Music', 'ZZZ']);
    });

    it('sorts names case-insensitively within a group', () => {
      const ordered = orderRecords(
        [createRecord('beta', 'Music'), createRecord('Alpha', 'Music'), createRecord('gamma', 'Music')],
        []
      );

      expect(ordered.map((r) => r.name)).toEqual(['Alpha', 'beta', 'gamma']);
    });

    it('keeps input order for names that differ only in case', () => {
      const ordered = orderRecords(
        [createRecord('news', 'News', 'first'), createRecord('NEWS', 'News', 'second')],
        []
      );

      expect(ordered.map((r) => r.link)).toEqual(['first', 'second']);
    });

    it('returns an empty list for no records', () => {
      expect(orderRecords([], ['Bangla'])).toEqual([]);
    });
  });
});
