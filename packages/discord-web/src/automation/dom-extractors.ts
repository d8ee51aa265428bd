/**
 * In-page extractors.
 *
 * Each function here is serialized with `toString()` and evaluated inside
 * the page, so it may only use its argument and DOM globals. No imports,
 * no helpers defined elsewhere, no named inner functions. The selector
 * arguments are CSS lists resolved from the selector registry.
 */

import type { AttachmentKind, ChannelType } from './types.js';

export interface RawServer {
  id: string;
  name: string;
}

export interface ServerSelectors {
  item: string;
  name: string;
}

export function extractServers(sel: ServerSelectors): RawServer[] {
  const servers: RawServer[] = [];
  const seen = new Set<string>();
  document.querySelectorAll(sel.item).forEach((item) => {
    const holder = item.hasAttribute('data-list-item-id')
      ? item
      : item.querySelector('[data-list-item-id^="guildsnav___"]');
    const listItemId = holder ? holder.getAttribute('data-list-item-id') || '' : '';
    const match = /^guildsnav___(\d+)$/.exec(listItemId);
    if (!match || seen.has(match[1])) return;

    const named = item.closest(sel.name) || item.querySelector(sel.name);
    let name = named ? named.getAttribute('data-dnd-name') || '' : '';
    if (!name) name = (holder && holder.getAttribute('aria-label')) || '';
    if (!name) name = item.textContent || '';
    name = name
      .replace(/^\s*\d+\s+mentions?,\s*/i, '')
      .replace(/\s+/g, ' ')
      .trim();
    if (!name) return;

    seen.add(match[1]);
    servers.push({ id: match[1], name });
  });
  return servers;
}

export interface RawChannel {
  id: string;
  name: string;
  type: ChannelType;
}

export interface ChannelSelectors {
  link: string;
  serverId: string;
}

export function extractChannels(sel: ChannelSelectors): RawChannel[] {
  const channels: RawChannel[] = [];
  const seen = new Set<string>();
  const serverId = sel.serverId.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`/channels/${serverId}/(\\d+)(?:$|[/?#])`);
  document.querySelectorAll(sel.link).forEach((link) => {
    const href = link.getAttribute('href') || '';
    const match = pattern.exec(href);
    if (!match || seen.has(match[1])) return;

    const label = (link.getAttribute('aria-label') || '').toLowerCase();
    let type: ChannelType = 'unknown';
    if (label.includes('announcement')) type = 'announcement';
    else if (label.includes('stage')) type = 'stage';
    else if (label.includes('voice')) type = 'voice';
    else if (label.includes('forum')) type = 'forum';
    else if (label.includes('thread')) type = 'thread';
    else if (label.includes('text') || label.includes('channel')) type = 'text';

    const nameEl = link.querySelector('[class*="name"]');
    let name = ((nameEl || link).textContent || '').replace(/\s+/g, ' ').trim();
    if (!name) {
      name = (link.getAttribute('aria-label') || '').replace(/\s*\(.*\)\s*$/, '').trim();
    }

    seen.add(match[1]);
    channels.push({ id: match[1], name: name || `channel-${match[1]}`, type });
  });
  return channels;
}

export interface RawAttachment {
  url: string;
  kind: AttachmentKind;
}

export interface RawMessage {
  id: string;
  channelId: string;
  authorName: string;
  authorId: string | null;
  /** `datetime` attribute of the message's `<time>`, when rendered. */
  timestamp: string | null;
  content: string;
  attachments: RawAttachment[];
  isEdited: boolean;
}

export interface TimelineSelectors {
  item: string;
  content: string;
  username: string;
  timestamp: string;
  avatar: string;
  edited: string;
  attachment: string;
  channelStart: string;
}

export interface RawTimeline {
  /** In DOM order, oldest first. */
  messages: RawMessage[];
  atChannelStart: boolean;
}

export function extractTimeline(sel: TimelineSelectors): RawTimeline {
  const messages: RawMessage[] = [];
  const seen = new Set<string>();
  let lastAuthorName = 'Unknown';
  let lastAuthorId: string | null = null;

  document.querySelectorAll(sel.item).forEach((el) => {
    const match = /^chat-messages-(\d+)-(\d+)$/.exec(el.id);
    if (!match || seen.has(match[2])) return;
    const channelId = match[1];
    const id = match[2];

    // Grouped follow-up messages render without a header, so the author carries over.
    const usernameEl = el.querySelector(sel.username);
    const authorName = usernameEl ? (usernameEl.textContent || '').trim() : '';
    if (authorName) {
      lastAuthorName = authorName;
      const avatar = el.querySelector(sel.avatar);
      const src = avatar ? avatar.getAttribute('src') || '' : '';
      const avatarMatch = /\/avatars\/(\d+)\//.exec(src);
      lastAuthorId = avatarMatch ? avatarMatch[1] : null;
    }

    const contentEl = el.querySelector(`[id="message-content-${id}"]`) || el.querySelector(sel.content);
    let content = '';
    let isEdited = false;
    if (contentEl) {
      const copy = contentEl.cloneNode(true);
      if (copy instanceof Element) {
        copy.querySelectorAll(sel.edited).forEach((marker) => {
          isEdited = true;
          marker.remove();
        });
        content = (copy.textContent || '').trim();
      }
    }
    if (!isEdited && el.querySelector(sel.edited)) isEdited = true;

    const timeEl = el.querySelector(sel.timestamp);
    const timestamp = timeEl ? timeEl.getAttribute('datetime') : null;

    const attachments: RawAttachment[] = [];
    const urls = new Set<string>();
    el.querySelectorAll(sel.attachment).forEach((node) => {
      const url = node.getAttribute('href') || node.getAttribute('src') || '';
      if (!url || urls.has(url)) return;
      urls.add(url);
      const tag = node.tagName.toLowerCase();
      const path = url.split('?')[0].toLowerCase();
      let kind: AttachmentKind = 'file';
      if (tag === 'img' || /\.(png|jpe?g|gif|webp|avif|bmp)$/.test(path)) kind = 'image';
      else if (tag === 'video' || tag === 'source' || /\.(mp4|webm|mov|mkv)$/.test(path)) kind = 'video';
      else if (tag === 'audio' || /\.(mp3|ogg|wav|flac|m4a)$/.test(path)) kind = 'audio';
      attachments.push({ url, kind });
    });

    seen.add(id);
    messages.push({
      id,
      channelId,
      authorName: lastAuthorName,
      authorId: lastAuthorId,
      timestamp,
      content,
      attachments,
      isEdited,
    });
  });

  return { messages, atChannelStart: document.querySelector(sel.channelStart) !== null };
}

export interface RawSearchResult {
  messageId: string | null;
  channelId: string | null;
  channelName: string;
  authorName: string;
  authorId: string | null;
  timestamp: string | null;
  content: string;
}

export interface SearchSelectors {
  result: string;
  totalCount: string;
  noResults: string;
  username: string;
  timestamp: string;
  content: string;
  avatar: string;
}

export interface RawSearchPage {
  results: RawSearchResult[];
  totalText: string | null;
  noResults: boolean;
}

export function extractSearchResults(sel: SearchSelectors): RawSearchPage {
  const results: RawSearchResult[] = [];
  const all = Array.from(document.querySelectorAll(sel.result));
  // Result wrappers can match the same selector as the results they contain.
  const leaves = all.filter((el) => !all.some((other) => other !== el && el.contains(other)));

  leaves.forEach((el, index) => {
    // Lets the controller click exactly the result that was extracted.
    el.setAttribute('data-result-index', String(index));
    let messageId: string | null = null;
    let channelId: string | null = null;
    const idHolder = el.querySelector('[id^="chat-messages-"], [id^="search-result-"]');
    const idMatch = idHolder ? /(\d+)-(\d+)$/.exec(idHolder.id) : null;
    if (idMatch) {
      channelId = idMatch[1];
      messageId = idMatch[2];
    }

    const usernameEl = el.querySelector(sel.username);
    const avatar = el.querySelector(sel.avatar);
    const avatarMatch = /\/avatars\/(\d+)\//.exec(avatar ? avatar.getAttribute('src') || '' : '');
    const timeEl = el.querySelector(sel.timestamp);
    const contentEl =
      (messageId && el.querySelector(`[id="message-content-${messageId}"]`)) || el.querySelector(sel.content);
    const channelEl = el.querySelector('[class*="channelName"]');

    results.push({
      messageId,
      channelId,
      channelName: channelEl ? (channelEl.textContent || '').trim() : '',
      authorName: usernameEl ? (usernameEl.textContent || '').trim() || 'Unknown' : 'Unknown',
      authorId: avatarMatch ? avatarMatch[1] : null,
      timestamp: timeEl ? timeEl.getAttribute('datetime') : null,
      content: contentEl ? (contentEl.textContent || '').trim() : '',
    });
  });

  const totalEl = document.querySelector(sel.totalCount);
  return {
    results,
    totalText: totalEl ? (totalEl.textContent || '').trim() : null,
    noResults: document.querySelector(sel.noResults) !== null,
  };
}

export interface AlertSelectors {
  alerts: string;
  cooldown: string;
}

export interface RawAlerts {
  texts: string[];
  cooldown: string | null;
}

export function extractAlerts(sel: AlertSelectors): RawAlerts {
  const texts: string[] = [];
  document.querySelectorAll(sel.alerts).forEach((el) => {
    const text = (el.textContent || '').replace(/\s+/g, ' ').trim();
    if (text && !texts.includes(text)) texts.push(text);
  });
  const cooldownEl = document.querySelector(sel.cooldown);
  return {
    texts,
    cooldown: cooldownEl ? (cooldownEl.textContent || '').trim() || null : null,
  };
}

export interface LatestMessageSelectors {
  item: string;
  failed: string;
  pending: string;
}

export interface RawLatestMessage {
  id: string | null;
  failed: boolean;
  /** Still waiting for the server to acknowledge it. */
  pending: boolean;
}

export function extractLatestMessage(sel: LatestMessageSelectors): RawLatestMessage {
  const items = Array.from(document.querySelectorAll(sel.item)).filter((el) =>
    /^chat-messages-\d+-\d+$/.test(el.id),
  );
  const last = items.length > 0 ? items[items.length - 1] : null;
  if (!last) return { id: null, failed: false, pending: false };
  return {
    id: last.id.split('-').pop() || null,
    failed: last.matches(sel.failed) || last.querySelector(sel.failed) !== null,
    pending: last.matches(sel.pending) || last.querySelector(sel.pending) !== null,
  };
}

export interface ScrollRequest {
  selector: string;
  /** Pixels to scroll; `top` and `bottom` jump to the edge. */
  to: number | 'top' | 'bottom';
}

export interface ScrollPosition {
  found: boolean;
  atTop: boolean;
  atBottom: boolean;
}

export function scrollContainer(req: ScrollRequest): ScrollPosition {
  let el = document.querySelector(req.selector);
  // Scroll the nearest ancestor that actually overflows.
  while (el && el.scrollHeight <= el.clientHeight && el.parentElement) {
    el = el.parentElement;
  }
  if (!el) return { found: false, atTop: true, atBottom: true };
  if (req.to === 'top') el.scrollTop = 0;
  else if (req.to === 'bottom') el.scrollTop = el.scrollHeight;
  else el.scrollTop += req.to;
  return {
    found: true,
    atTop: el.scrollTop <= 0,
    atBottom: el.scrollTop + el.clientHeight >= el.scrollHeight - 10,
  };
}
