// @vitest-environment jsdom
/**
 * In-page Extractor Tests
 *
 * Runs the extractors against static markup with the same selector lists
 * the classic adapter hands them.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SelectorRegistry } from '@discord-web/selectors';
import {
  extractAlerts,
  extractChannels,
  extractLatestMessage,
  extractSearchResults,
  extractServers,
  extractTimeline,
  scrollContainer,
} from '../src/automation/dom-extractors.js';

const registry = new SelectorRegistry('classic');

function render(html: string): void {
  document.body.innerHTML = html;
}

describe('dom extractors', () => {
  beforeEach(() => {
    document.body.innerHTML = '';
  });

  describe('extractServers', () => {
    it('reads guild ids and names in sidebar order', () => {
      render(`
        <div data-list-id="guildsnav">
          <div role="treeitem" data-list-item-id="guildsnav___111" aria-label="2 mentions, Cat Club">
            <div data-dnd-name="Cat Club"></div>
          </div>
          <div role="treeitem" data-list-item-id="guildsnav___222" aria-label="  Dog   Park "></div>
          <div role="treeitem" data-list-item-id="guildsnav___333" aria-label="3 mentions, Fish Tank"></div>
          <div role="treeitem" data-list-item-id="guildsnav___home" aria-label="Direct Messages"></div>
          <div role="treeitem" data-list-item-id="guildsnav___111" aria-label="Cat Club again"></div>
        </div>
      `);

      expect(extractServers(registry.resolvePaths({ item: 'nav.guildItem', name: 'nav.guildName' }))).toEqual([
        { id: '111', name: 'Cat Club' },
        { id: '222', name: 'Dog Park' },
        { id: '333', name: 'Fish Tank' },
      ]);
    });
  });

  describe('extractChannels', () => {
    it('reads the channels of one server with their kind', () => {
      render(`
        <a data-list-item-id="channels___900" href="/channels/111/900" aria-label="general (text channel)">
          <div class="name_x">general</div>
        </a>
        <a data-list-item-id="channels___901" href="/channels/111/901" aria-label="Lounge (voice channel)">
          <div class="name_x"> Lounge </div>
        </a>
        <a data-list-item-id="channels___902" href="/channels/111/902" aria-label="news (announcement channel)"></a>
        <a href="/channels/222/950">elsewhere</a>
        <a href="/channels/111/900">general again</a>
      `);

      expect(extractChannels({ link: registry.css('channels.channelLink'), serverId: '111' })).toEqual([
        { id: '900', name: 'general', type: 'text' },
        { id: '901', name: 'Lounge', type: 'voice' },
        { id: '902', name: 'news', type: 'announcement' },
      ]);
    });
  });

  describe('extractTimeline', () => {
    const selectors = registry.resolvePaths({
      item: 'chat.messageItem',
      content: 'chat.messageContent',
      username: 'chat.username',
      timestamp: 'chat.timestamp',
      avatar: 'chat.avatar',
      edited: 'chat.editedMarker',
      attachment: 'chat.attachment',
      channelStart: 'chat.channelStart',
    });

    const timeline = `
      <ol data-list-id="chat-messages">
        <li id="chat-messages-222-1001" class="messageListItem_abc">
          <img class="avatar_x" src="https://cdn.discordapp.com/avatars/555/abc.png">
          <h3>
            <span id="message-username-1001"><span class="username_x">alice</span></span>
            <time id="message-timestamp-1001" datetime="2024-06-01T10:00:00.000Z">Today</time>
          </h3>
          <div id="message-content-1001" class="markup_x">hello <span class="edited_x">(edited)</span></div>
          <a href="https://cdn.discordapp.com/attachments/1/2/photo.PNG?ex=1">photo</a>
        </li>
        <li id="chat-messages-222-1002" class="messageListItem_abc">
          <time id="message-timestamp-1002" datetime="2024-06-01T10:01:00.000Z">10:01</time>
          <div id="message-content-1002" class="markup_x">follow up</div>
        </li>
      </ol>
    `;

    it('reads messages oldest first and carries the author over grouped messages', () => {
      render(timeline);

      expect(extractTimeline(selectors)).toEqual({
        messages: [
          {
            id: '1001',
            channelId: '222',
            authorName: 'alice',
            authorId: '555',
            timestamp: '2024-06-01T10:00:00.000Z',
            content: 'hello',
            attachments: [{ url: 'https://cdn.discordapp.com/attachments/1/2/photo.PNG?ex=1', kind: 'image' }],
            isEdited: true,
          },
          {
            id: '1002',
            channelId: '222',
            authorName: 'alice',
            authorId: '555',
            timestamp: '2024-06-01T10:01:00.000Z',
            content: 'follow up',
            attachments: [],
            isEdited: false,
          },
        ],
        atChannelStart: false,
      });
    });

    it('reports the start of the channel', () => {
      render(`<div class="emptyChannel_x">Welcome to #general</div>${timeline}`);

      expect(extractTimeline(selectors).atChannelStart).toBe(true);
    });
  });

  describe('extractSearchResults', () => {
    it('reads leaf results and tags them with their position', () => {
      render(`
        <div class="searchResultsWrap_x">
          <div class="totalResults_x">3 Results</div>
          <div class="searchResultGroup_x">
            <div class="searchResult_a">
              <div class="channelName_x">general</div>
              <li id="chat-messages-222-1001">
                <img class="avatar_x" src="https://cdn.discordapp.com/avatars/555/a.png">
                <span class="username_x">alice</span>
                <time datetime="2024-06-01T10:00:00.000Z">Today</time>
                <div id="message-content-1001">cats are great</div>
              </li>
            </div>
            <div class="searchResult_a">
              <span class="username_x">bob</span>
              <div class="markup_x">no id here</div>
            </div>
          </div>
        </div>
      `);

      const page = extractSearchResults(
        registry.resolvePaths({
          result: 'search.result',
          totalCount: 'search.totalCount',
          noResults: 'search.noResults',
          username: 'chat.username',
          timestamp: 'chat.timestamp',
          content: 'chat.messageContent',
          avatar: 'chat.avatar',
        }),
      );

      expect(page).toEqual({
        results: [
          {
            messageId: '1001',
            channelId: '222',
            channelName: 'general',
            authorName: 'alice',
            authorId: '555',
            timestamp: '2024-06-01T10:00:00.000Z',
            content: 'cats are great',
          },
          {
            messageId: null,
            channelId: null,
            channelName: '',
            authorName: 'bob',
            authorId: null,
            timestamp: null,
            content: 'no id here',
          },
        ],
        totalText: '3 Results',
        noResults: false,
      });
      expect(document.querySelector('[data-result-index="1"]')?.textContent).toContain('bob');
    });
  });

  describe('extractAlerts', () => {
    it('collects distinct alert texts and the slowmode countdown', () => {
      render(`
        <div class="notice_x">You are being rate limited.</div>
        <div role="alert">  You are being   rate limited. </div>
        <div class="slowModeCooldown_x"> 0:15 </div>
      `);

      const alerts = extractAlerts({
        alerts: [registry.css('alerts.banner'), registry.css('alerts.toast'), registry.css('alerts.modal')].join(', '),
        cooldown: registry.css('composer.cooldown'),
      });

      expect(alerts).toEqual({ texts: ['You are being rate limited.'], cooldown: '0:15' });
    });
  });

  describe('extractLatestMessage', () => {
    const selectors = registry.resolvePaths({
      item: 'chat.messageItem',
      failed: 'chat.failedMessage',
      pending: 'chat.pendingMessage',
    });

    it('reads the id and delivery state of the last message', () => {
      render(`
        <ol data-list-id="chat-messages">
          <li id="chat-messages-222-1001"></li>
          <li id="chat-messages-222-1002" class="isFailed_x"></li>
        </ol>
      `);

      expect(extractLatestMessage(selectors)).toEqual({ id: '1002', failed: true, pending: false });
    });

    it('returns no id for an empty channel', () => {
      expect(extractLatestMessage(selectors)).toEqual({ id: null, failed: false, pending: false });
    });
  });

  describe('scrollContainer', () => {
    it('reports a missing container', () => {
      expect(scrollContainer({ selector: '#missing', to: 'bottom' })).toEqual({
        found: false,
        atTop: true,
        atBottom: true,
      });
    });
  });
});
