/**
 * Search Query Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { OutOfRangeError } from '../src/automation/errors.js';
import { buildSearchQuery, needsChannelNames, validateFilter } from '../src/automation/search-query.js';

describe('buildSearchQuery', () => {
  it('emits free text then filter tokens in a fixed order', () => {
    const query = buildSearchQuery({
      query: 'deploy',
      pinned: true,
      authorType: 'bot',
      dateTo: '2024-03-31',
      dateFrom: '2024-03-01',
      contentTypes: ['link', 'image'],
      mentions: ['carol'],
      authorIds: ['bob', 'alice', 'bob'],
      channelIds: ['general'],
      pageOffset: 0,
    });

    expect(query).toBe(
      'deploy in:general from:alice from:bob mentions:carol has:image has:link ' +
        'after:2024-02-29 before:2024-04-01 authorType:bot pinned: true',
    );
  });

  it('builds the same string for equal filters given in any order', () => {
    const a = buildSearchQuery({ authorIds: ['zed', 'amy'], contentTypes: ['video', 'file'], pageOffset: 0 });
    const b = buildSearchQuery({ authorIds: ['amy', 'zed', 'amy'], contentTypes: ['file', 'video'], pageOffset: 3 });
    expect(a).toBe('from:amy from:zed has:file has:video');
    expect(b).toBe(a);
  });

  it('resolves channel ids to sidebar names and passes names through', () => {
    const names = new Map([['123456789012345678', 'general']]);
    expect(buildSearchQuery({ channelIds: ['random', '123456789012345678'], pageOffset: 0 }, names)).toBe(
      'in:general in:random',
    );
  });

  it('quotes values that contain spaces', () => {
    expect(buildSearchQuery({ channelIds: ['off topic'], pageOffset: 0 })).toBe('in:"off topic"');
  });

  it('collapses whitespace in the free text', () => {
    expect(buildSearchQuery({ query: '  hello   world ', pageOffset: 0 })).toBe('hello world');
  });

  it('uses during: for a single day', () => {
    expect(buildSearchQuery({ during: '2024-05-05', pageOffset: 0 })).toBe('during:2024-05-05');
  });

  it('rejects a filter with nothing to search for', () => {
    expect(() => buildSearchQuery({ query: '   ', pageOffset: 0 })).toThrow(OutOfRangeError);
  });
});

describe('validateFilter', () => {
  it('rejects malformed and impossible dates', () => {
    expect(() => validateFilter({ dateFrom: '2024-02-30', pageOffset: 0 })).toThrow(OutOfRangeError);
    expect(() => validateFilter({ during: '05/05/2024', pageOffset: 0 })).toThrow(OutOfRangeError);
  });

  it('rejects a date range that ends before it starts', () => {
    expect(() => validateFilter({ dateFrom: '2024-04-02', dateTo: '2024-04-01', pageOffset: 0 })).toThrow(
      /after dateTo/,
    );
  });

  it('rejects negative or fractional page offsets', () => {
    expect(() => validateFilter({ query: 'x', pageOffset: -1 })).toThrow(OutOfRangeError);
    expect(() => validateFilter({ query: 'x', pageOffset: 1.5 })).toThrow(OutOfRangeError);
  });
});

describe('needsChannelNames', () => {
  it('is true only when a channel value looks like an id', () => {
    expect(needsChannelNames({ channelIds: ['general'], pageOffset: 0 })).toBe(false);
    expect(needsChannelNames({ channelIds: ['123456789012345678'], pageOffset: 0 })).toBe(true);
    expect(needsChannelNames({ pageOffset: 0 })).toBe(false);
  });
});
