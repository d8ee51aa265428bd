export type SelectorType = 'css' | 'playwright';

export interface SelectorContract {
  expectedCount: 'one' | 'many' | number;
  mustBeClickable?: boolean;
  mustBeVisible?: boolean;
  extractionType?: 'text' | 'attribute' | 'html';
  attribute?: string;
  optional?: boolean;
}

export interface Selector {
  primary: string;
  fallbacks: string[];
  /**
   * `css` selectors are valid for `document.querySelectorAll` and may be used
   * inside in-page extractors. `playwright` selectors use engine extensions
   * such as `:has-text()` and only work through the browser controller.
   */
  type: SelectorType;
  contract: SelectorContract;
}

export interface SelectorGroup {
  [elementName: string]: Selector;
}

export type SelectorSet = Record<string, SelectorGroup>;

export type Platform = 'discord';

/** Known layouts of the web client. One selector set exists per version. */
export type UiVersion = 'classic';
