export {
  SelectorRegistry,
  SelectorNotFoundError,
  UnknownUiVersionError,
  KNOWN_UI_VERSIONS,
  DEFAULT_UI_VERSION,
  isUiVersion,
} from './registry.js';
export type {
  Selector,
  SelectorGroup,
  SelectorSet,
  SelectorContract,
  SelectorType,
  Platform,
  UiVersion,
} from './types.js';

// Platform selectors
export { classicDiscordSelectors } from './platforms/discord/index.js';
