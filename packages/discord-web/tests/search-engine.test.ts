/**
 * Search Engine Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { OutOfRangeError } from '../src/automation/errors.js';
import { SearchEngine } from '../src/automation/search-engine.js';
import type { AutomationConfig, SearchPage } from '../src/automation/types.js';
import { createHarness, history, type Harness } from './helpers/fake-platform.js';

const CAT_INDEXES = [4, 9, 14];

function catHistory(channelId: string) {
  return history(channelId, 20, '2024-06-01T11:59:00.000Z').map((message, i) =>
    CAT_INDEXES.includes(i) ? { ...message, content: `${message.content} about cats` } : message,
  );
}

describe('SearchEngine', () => {
  let harness: Harness;

  async function setup(overrides: Partial<AutomationConfig> = {}): Promise<SearchEngine> {
    harness = await createHarness(overrides);
    harness.world.addChannel({ id: '2', serverId: '1', name: 'general', type: 'text' }, catHistory('2'));
    harness.world.index('cats', '1', '2', 'cats');
    return new SearchEngine(harness.manager);
  }

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('search', () => {
    it('returns a page of results newest first', async () => {
      const engine = await setup();

      const page = await engine.search('1', { query: 'cats', pageOffset: 0 });

      expect(page.pageOffset).toBe(0);
      expect(page.totalResults).toBe(3);
      expect(page.hasMore).toBe(false);
      expect(page.results.map((result) => [result.matchRank, result.message.content])).toEqual([
        [0, 'message 15 about cats'],
        [1, 'message 10 about cats'],
        [2, 'message 5 about cats'],
      ]);
      expect(page.results[0].message.channelId).toBe('2');
      expect(page.results[0].message.timestampUtc).toBe('2024-06-01T11:54:00.000Z');
      expect(harness.world.submittedQueries).toEqual(['cats']);
    });

    it('returns an empty page when nothing matches', async () => {
      const engine = await setup();

      const page = await engine.search('1', { query: 'dogs', pageOffset: 0 });

      expect(page).toEqual({ pageOffset: 0, results: [], totalResults: 0, hasMore: false });
      expect(harness.world.calls).not.toContain('readSearchResults');
    });

    it('resolves channel ids to names before searching', async () => {
      const engine = await setup();
      const channelId = '222222222222222222';
      harness.world.addChannel({ id: channelId, serverId: '1', name: 'pets', type: 'text' }, catHistory(channelId));
      harness.world.index('cats in:pets', '1', channelId, 'cats');

      const page = await engine.search('1', { query: 'cats', channelIds: [channelId], pageOffset: 0 });

      expect(harness.world.submittedQueries).toEqual(['cats in:pets']);
      expect(harness.world.calls).toContain('listChannels:1');
      expect(page.results).toHaveLength(3);
    });

    it('validates the filter before touching the browser', async () => {
      const engine = await setup();

      await expect(engine.search('1', { query: 'cats', dateFrom: '2024-13-01', pageOffset: 0 })).rejects.toBeInstanceOf(
        OutOfRangeError,
      );
      expect(harness.world.launches).toEqual([]);
    });
  });

  describe('paginate', () => {
    it('fetches pages lazily until there are no more', async () => {
      const engine = await setup({ searchPageSize: 2 });

      const pages = engine.paginate('1', { query: 'cats', pageOffset: 0 });
      expect(harness.world.calls).toEqual([]);

      const collected: SearchPage[] = [];
      for await (const page of pages) {
        collected.push(page);
      }

      expect(collected.map((page) => page.results.map((result) => result.matchRank))).toEqual([[0, 1], [2]]);
      expect(collected.map((page) => page.hasMore)).toEqual([true, false]);
    });

    it('starts over on every iteration', async () => {
      const engine = await setup({ searchPageSize: 2 });
      const pages = engine.paginate('1', { query: 'cats', pageOffset: 0 });

      const offsets = async (): Promise<number[]> => {
        const seen: number[] = [];
        for await (const page of pages) {
          seen.push(page.pageOffset);
        }
        return seen;
      };

      expect(await offsets()).toEqual([0, 1]);
      expect(await offsets()).toEqual([0, 1]);
      expect(harness.world.submittedQueries).toEqual(['cats', 'cats', 'cats', 'cats']);
    });
  });

  describe('resolveContext', () => {
    it('returns the messages around a result in channel order', async () => {
      const engine = await setup();

      const context = await engine.resolveContext('1', 'cats', 0, 2, 2);

      expect(context.anchor.content).toBe('message 15 about cats');
      expect(context.before.map((message) => message.content)).toEqual(['message 13', 'message 14']);
      expect(context.after.map((message) => message.content)).toEqual(['message 16', 'message 17']);
      expect(harness.world.calls).toContain('jumpToSearchResult:0');
    });

    it('returns the same window on repeated calls', async () => {
      const engine = await setup();

      const first = await engine.resolveContext('1', 'cats', 1, 3, 3);
      const second = await engine.resolveContext('1', 'cats', 1, 3, 3);

      expect(second).toEqual(first);
      expect(first.anchor.content).toBe('message 10 about cats');
    });

    it('returns fewer older messages at the start of the channel', async () => {
      const engine = await setup();

      const context = await engine.resolveContext('1', 'cats', 2, 6, 0);

      expect(context.anchor.content).toBe('message 5 about cats');
      expect(context.before.map((message) => message.content)).toEqual([
        'message 1',
        'message 2',
        'message 3',
        'message 4',
      ]);
      expect(context.after).toEqual([]);
    });

    it('scrolls newer until the end of the channel', async () => {
      const engine = await setup();

      const context = await engine.resolveContext('1', 'cats', 0, 0, 7);

      expect(context.after.map((message) => message.content)).toEqual([
        'message 16',
        'message 17',
        'message 18',
        'message 19',
        'message 20',
      ]);
      expect(harness.world.calls.filter((call) => call === 'scroll:newer')).toHaveLength(2);
    });

    it('keeps reading older history that loads after the scroll reached the top', async () => {
      const engine = await setup();
      harness.world.staleScrollPosition = true;

      const context = await engine.resolveContext('1', 'cats', 0, 12, 0);

      expect(context.anchor.content).toBe('message 15 about cats');
      expect(context.before.map((message) => message.content)).toEqual(
        Array.from({ length: 12 }, (_, i) => `message ${i + 3}`),
      );
      expect(harness.world.calls.filter((call) => call === 'scroll:older')).toHaveLength(2);
    });

    it('keeps reading newer history that loads after the scroll reached the bottom', async () => {
      const engine = await setup();
      harness.world.staleScrollPosition = true;

      const context = await engine.resolveContext('1', 'cats', 2, 0, 12);

      expect(context.anchor.content).toBe('message 5 about cats');
      expect(context.after.map((message) => message.content)).toEqual(
        Array.from({ length: 12 }, (_, i) => `message ${i + 6}`),
      );
    });

    it('rejects an index past the last result', async () => {
      const engine = await setup();

      await expect(engine.resolveContext('1', 'cats', 3, 1, 1)).rejects.toMatchObject({
        code: 'OUT_OF_RANGE',
        parameter: 'resultIndex',
      });
    });

    it('rejects negative counts before touching the browser', async () => {
      const engine = await setup();

      await expect(engine.resolveContext('1', 'cats', 0, -1, 1)).rejects.toBeInstanceOf(OutOfRangeError);
      await expect(engine.resolveContext('1', 'cats', 0, 1, 1001)).rejects.toBeInstanceOf(OutOfRangeError);
      expect(harness.world.launches).toEqual([]);
    });
  });
});
