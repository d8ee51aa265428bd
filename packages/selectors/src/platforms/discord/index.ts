import type { SelectorGroup, SelectorSet } from '../../types.js';

export const authSelectors: SelectorGroup = {
  emailInput: {
    primary: 'input[name="email"]',
    fallbacks: ['input[type="email"]', 'input[autocomplete="username"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true },
  },
  passwordInput: {
    primary: 'input[name="password"]',
    fallbacks: ['input[type="password"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true },
  },
  submitButton: {
    primary: 'button[type="submit"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', mustBeClickable: true },
  },
  loginError: {
    primary: '[class*="errorMessage"]',
    fallbacks: ['[class*="inputError"]', 'form [role="alert"]'],
    type: 'css',
    contract: { expectedCount: 'many', extractionType: 'text', optional: true },
  },
  mfaInput: {
    primary: 'input[autocomplete="one-time-code"]',
    fallbacks: ['input[placeholder*="6-digit"]', 'input[inputmode="numeric"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true, optional: true },
  },
  captchaFrame: {
    primary: 'iframe[src*="hcaptcha"]',
    fallbacks: ['iframe[title*="captcha"]'],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
  verifyNotice: {
    primary: '[class*="authBox"] [class*="verify"]',
    fallbacks: ['[class*="verifyEmail"]'],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
};

export const navSelectors: SelectorGroup = {
  guildTree: {
    primary: '[data-list-id="guildsnav"]',
    fallbacks: ['nav[aria-label="Servers sidebar"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true },
  },
  guildItem: {
    primary: '[data-list-id="guildsnav"] [role="treeitem"]',
    fallbacks: ['[data-list-item-id^="guildsnav___"]'],
    type: 'css',
    contract: { expectedCount: 'many', mustBeVisible: true },
  },
  guildName: {
    primary: '[data-dnd-name]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'attribute', attribute: 'data-dnd-name', optional: true },
  },
};

export const channelSelectors: SelectorGroup = {
  channelLink: {
    primary: 'a[data-list-item-id^="channels___"]',
    fallbacks: ['a[href*="/channels/"]'],
    type: 'css',
    contract: { expectedCount: 'many', extractionType: 'attribute', attribute: 'href' },
  },
  channelList: {
    primary: '[data-list-id="channels"]',
    fallbacks: ['nav[aria-label*="channels"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true },
  },
  browseChannels: {
    primary: '[data-list-item-id="channels___browse"]',
    fallbacks: ['div[role="button"]:has-text("Browse Channels")'],
    type: 'playwright',
    contract: { expectedCount: 'one', mustBeClickable: true, optional: true },
  },
};

export const chatSelectors: SelectorGroup = {
  messageList: {
    primary: '[data-list-id="chat-messages"]',
    fallbacks: ['ol[class*="scrollerInner"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true },
  },
  messageItem: {
    primary: '[id^="chat-messages-"]',
    fallbacks: ['li[class*="messageListItem"]'],
    type: 'css',
    contract: { expectedCount: 'many' },
  },
  messageContent: {
    primary: '[id^="message-content-"]',
    fallbacks: ['[class*="messageContent"]', '[class*="markup"]'],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'text', optional: true },
  },
  username: {
    primary: '[id^="message-username-"] [class*="username"]',
    fallbacks: ['[class*="username"]', '[class*="authorName"]'],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'text', optional: true },
  },
  timestamp: {
    primary: 'time[id^="message-timestamp-"]',
    fallbacks: ['time[datetime]'],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'attribute', attribute: 'datetime', optional: true },
  },
  avatar: {
    primary: 'img[class*="avatar"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'attribute', attribute: 'src', optional: true },
  },
  editedMarker: {
    primary: '[class*="edited"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
  attachment: {
    primary: 'a[href*="cdn.discordapp.com/attachments"]',
    fallbacks: [
      'a[href*="media.discordapp.net/attachments"]',
      'img[src*="/attachments/"]',
      'video[src*="/attachments/"]',
      'video source[src*="/attachments/"]',
      'audio[src*="/attachments/"]',
    ],
    type: 'css',
    contract: { expectedCount: 'many', optional: true },
  },
  channelStart: {
    primary: '[class*="emptyChannel"]',
    fallbacks: ['[data-list-id="chat-messages"] [class*="channelBeginning"]'],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
  scroller: {
    primary: 'main [class*="messagesWrapper"] [class*="scroller"]',
    fallbacks: ['main [class*="scroller"]'],
    type: 'css',
    contract: { expectedCount: 'one' },
  },
  pendingMessage: {
    primary: '[class*="isSending"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'many', optional: true },
  },
  failedMessage: {
    primary: '[class*="isFailed"]',
    fallbacks: ['[class*="messageFailed"]'],
    type: 'css',
    contract: { expectedCount: 'many', optional: true },
  },
};

export const composerSelectors: SelectorGroup = {
  textbox: {
    primary: '[data-slate-editor="true"]',
    fallbacks: ['[role="textbox"][contenteditable="true"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true, mustBeClickable: true },
  },
  cooldown: {
    primary: '[class*="slowModeCooldown"]',
    fallbacks: ['[class*="cooldownWrapper"]'],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'text', optional: true },
  },
};

export const searchSelectors: SelectorGroup = {
  searchBox: {
    primary: '[role="combobox"][aria-label="Search"]',
    fallbacks: ['[role="combobox"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeVisible: true, mustBeClickable: true },
  },
  result: {
    primary: 'div[class*="searchResult_"]',
    fallbacks: ['div[class*="searchResult"]'],
    type: 'css',
    contract: { expectedCount: 'many', mustBeVisible: true },
  },
  totalCount: {
    primary: '[class*="totalResults"]',
    fallbacks: ['[class*="searchHeader"] [class*="title"]'],
    type: 'css',
    contract: { expectedCount: 'one', extractionType: 'text', optional: true },
  },
  noResults: {
    primary: '[class*="noResults"]',
    fallbacks: ['[class*="emptyResults"]'],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
  pageButton: {
    primary: 'nav[class*="pagination"] button',
    fallbacks: ['[class*="paginationContainer"] button'],
    type: 'css',
    contract: { expectedCount: 'many', mustBeClickable: true, optional: true },
  },
  nextButton: {
    primary: 'nav[class*="pagination"] button[rel="next"]',
    fallbacks: ['button[aria-label="Next"]', '[class*="paginationContainer"] button[rel="next"]'],
    type: 'css',
    contract: { expectedCount: 'one', mustBeClickable: true, optional: true },
  },
  sortTab: {
    primary: '[class*="searchHeader"] [role="tab"]',
    fallbacks: ['[role="tablist"] [role="tab"]'],
    type: 'css',
    contract: { expectedCount: 'many', mustBeClickable: true, optional: true },
  },
  closeButton: {
    primary: '[class*="searchResultsWrap"] button[aria-label="Close"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
};

export const alertSelectors: SelectorGroup = {
  banner: {
    primary: '[class*="notice_"]',
    fallbacks: ['[role="alert"]'],
    type: 'css',
    contract: { expectedCount: 'many', extractionType: 'text', optional: true },
  },
  toast: {
    primary: '[class*="toast"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'many', extractionType: 'text', optional: true },
  },
  modal: {
    primary: '[role="dialog"]',
    fallbacks: [],
    type: 'css',
    contract: { expectedCount: 'one', optional: true },
  },
};

/** Selector set for the current web client layout. */
export const classicDiscordSelectors: SelectorSet = {
  auth: authSelectors,
  nav: navSelectors,
  channels: channelSelectors,
  chat: chatSelectors,
  composer: composerSelectors,
  search: searchSelectors,
  alerts: alertSelectors,
};
