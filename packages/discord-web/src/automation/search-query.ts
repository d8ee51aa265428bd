/**
 * Search query builder.
 *
 * Turns a SearchFilter into the exact text typed into the search box. Equal
 * filters always produce the same string.
 */

import { OutOfRangeError } from './errors.js';
import type { SearchFilter } from './types.js';
import { isIsoDate, isSnowflake, shiftDate } from '../utils/index.js';

function normalizeSet(values: Iterable<string> | undefined): string[] {
  if (!values) return [];
  const unique = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) unique.add(trimmed);
  }
  return Array.from(unique).sort();
}

function requireDate(field: string, value: string): string {
  if (!isIsoDate(value)) {
    throw new OutOfRangeError(field, `${field} must be a YYYY-MM-DD date, got "${value}"`, {
      context: { action: 'buildSearchQuery' },
    });
  }
  return value;
}

/** Values containing whitespace are quoted so the search box keeps them whole. */
function tokenValue(value: string): string {
  return /\s/.test(value) ? `"${value.replace(/"/g, '')}"` : value;
}

export function validateFilter(filter: SearchFilter): void {
  if (!Number.isInteger(filter.pageOffset) || filter.pageOffset < 0) {
    throw new OutOfRangeError('pageOffset', `pageOffset must be a non-negative integer, got ${filter.pageOffset}`, {
      context: { action: 'search' },
    });
  }
  const from = filter.dateFrom === undefined ? null : requireDate('dateFrom', filter.dateFrom);
  const to = filter.dateTo === undefined ? null : requireDate('dateTo', filter.dateTo);
  if (filter.during !== undefined) requireDate('during', filter.during);
  if (from !== null && to !== null && from > to) {
    throw new OutOfRangeError('dateFrom', `dateFrom ${from} is after dateTo ${to}`, {
      context: { action: 'search' },
    });
  }
}

/**
 * Whether any channel filter value is an id that has to be resolved to its
 * sidebar name first.
 */
export function needsChannelNames(filter: SearchFilter): boolean {
  return normalizeSet(filter.channelIds).some(isSnowflake);
}

/**
 * Free text first, then filter tokens in a fixed order. Channel ids found in
 * `channelNames` are replaced by their names; other values are used as typed.
 */
export function buildSearchQuery(filter: SearchFilter, channelNames: ReadonlyMap<string, string> = new Map()): string {
  validateFilter(filter);
  const parts: string[] = [];

  const text = filter.query?.trim();
  if (text) parts.push(text.replace(/\s+/g, ' '));

  const channels = normalizeSet(
    normalizeSet(filter.channelIds).map((value) => channelNames.get(value) ?? value),
  );
  for (const channel of channels) parts.push(`in:${tokenValue(channel)}`);
  for (const author of normalizeSet(filter.authorIds)) parts.push(`from:${tokenValue(author)}`);
  for (const mention of normalizeSet(filter.mentions)) parts.push(`mentions:${tokenValue(mention)}`);
  for (const kind of normalizeSet(filter.contentTypes)) parts.push(`has:${kind}`);

  if (filter.dateFrom !== undefined) parts.push(`after:${shiftDate(filter.dateFrom, -1)}`);
  if (filter.dateTo !== undefined) parts.push(`before:${shiftDate(filter.dateTo, 1)}`);
  if (filter.during !== undefined) parts.push(`during:${filter.during}`);
  if (filter.authorType !== undefined) parts.push(`authorType:${filter.authorType}`);
  if (filter.pinned) parts.push('pinned: true');

  if (parts.length === 0) {
    throw new OutOfRangeError('query', 'A search needs free text or at least one filter', {
      context: { action: 'buildSearchQuery' },
    });
  }
  return parts.join(' ');
}
