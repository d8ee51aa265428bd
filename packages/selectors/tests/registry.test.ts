/**
 * Selector Registry Tests
 */

import { describe, it, expect } from 'vitest';
import {
  SelectorRegistry,
  SelectorNotFoundError,
  UnknownUiVersionError,
  isUiVersion,
  classicDiscordSelectors,
} from '../src/index.js';

describe('SelectorRegistry', () => {
  const registry = new SelectorRegistry();

  it('defaults to the classic UI version', () => {
    expect(registry.getVersion()).toBe('classic');
  });

  it('rejects unknown UI versions', () => {
    expect(() => new SelectorRegistry('redesign-2031')).toThrow(UnknownUiVersionError);
    expect(isUiVersion('classic')).toBe(true);
    expect(isUiVersion('redesign-2031')).toBe(false);
  });

  it('returns the primary selector with or without the platform prefix', () => {
    expect(registry.get('chat.messageItem')).toBe('[id^="chat-messages-"]');
    expect(registry.get('discord.chat.messageItem')).toBe('[id^="chat-messages-"]');
  });

  it('joins primary and fallbacks into one selector list', () => {
    expect(registry.getWithFallbacks('auth.passwordInput')).toEqual([
      'input[name="password"]',
      'input[type="password"]',
    ]);
    expect(registry.css('auth.passwordInput')).toBe('input[name="password"], input[type="password"]');
  });

  it('throws SelectorNotFoundError for unknown paths', () => {
    expect(() => registry.get('chat.doesNotExist')).toThrow(SelectorNotFoundError);
    expect(registry.has('chat.doesNotExist')).toBe(false);
    expect(registry.has('search.searchBox')).toBe(true);
  });

  it('lists every path of a group', () => {
    const paths = registry.getPathsForGroup('composer');
    expect(paths).toEqual(['discord.composer.textbox', 'discord.composer.cooldown']);
  });

  it('registers every selector of the classic set', () => {
    const expected = Object.values(classicDiscordSelectors)
      .reduce((count, group) => count + Object.keys(group).length, 0);
    expect(registry.getAllPaths()).toHaveLength(expected);
  });

  it('resolves named paths for in-page extractors', () => {
    const resolved = registry.resolvePaths({
      item: 'chat.messageItem',
      time: 'chat.timestamp',
    });
    expect(resolved).toEqual({
      item: '[id^="chat-messages-"], li[class*="messageListItem"]',
      time: 'time[id^="message-timestamp-"], time[datetime]',
    });
  });

  it('refuses to resolve engine-specific selectors for extractors', () => {
    expect(() => registry.resolvePaths({ browse: 'channels.browseChannels' })).toThrow(
      'not a plain CSS selector',
    );
  });

  it('exposes contracts', () => {
    expect(registry.getContract('composer.textbox').mustBeVisible).toBe(true);
    expect(registry.getContract('chat.editedMarker').optional).toBe(true);
  });
});
