/**
 * Conversion of raw extractor output into domain records.
 */

import type { RawMessage, RawSearchResult } from './dom-extractors.js';
import type { Message } from './types.js';
import { compareSnowflakes, snowflakeToIso } from '../utils/index.js';

const EPOCH_ISO = new Date(0).toISOString();

export function normalizeTimestamp(value: string | null, id: string): string {
  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }
  return snowflakeToIso(id) ?? EPOCH_ISO;
}

export function toMessage(raw: RawMessage): Message {
  return {
    id: raw.id,
    channelId: raw.channelId,
    authorName: raw.authorName,
    authorId: raw.authorId,
    timestampUtc: normalizeTimestamp(raw.timestamp, raw.id),
    content: raw.content,
    attachments: raw.attachments.map((attachment) => ({ ...attachment })),
    isEdited: raw.isEdited,
  };
}

/**
 * Search results may lack a message id when the layout hides it; those get
 * a positional placeholder so every result still has an identity.
 */
export function searchResultToMessage(raw: RawSearchResult, matchRank: number): Message {
  const id = raw.messageId ?? `search-${matchRank}`;
  return {
    id,
    channelId: raw.channelId ?? '',
    authorName: raw.authorName,
    authorId: raw.authorId,
    timestampUtc: normalizeTimestamp(raw.timestamp, id),
    content: raw.content,
    attachments: [],
    isEdited: false,
  };
}

/** Newest first; equal timestamps fall back to id, larger first. */
export function compareNewestFirst(a: Message, b: Message): number {
  if (a.timestampUtc !== b.timestampUtc) {
    return a.timestampUtc < b.timestampUtc ? 1 : -1;
  }
  return compareSnowflakes(b.id, a.id);
}

export function compareOldestFirst(a: Message, b: Message): number {
  return compareNewestFirst(b, a);
}
