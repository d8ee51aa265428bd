import type { Platform, Selector, SelectorContract, SelectorSet, UiVersion } from './types.js';
import { classicDiscordSelectors } from './platforms/discord/index.js';

export class SelectorNotFoundError extends Error {
  constructor(path: string) {
    super(`Selector not found: ${path}`);
    this.name = 'SelectorNotFoundError';
  }
}

export class UnknownUiVersionError extends Error {
  constructor(version: string) {
    super(`Unknown UI version: ${version} (known: ${KNOWN_UI_VERSIONS.join(', ')})`);
    this.name = 'UnknownUiVersionError';
  }
}

const SELECTOR_SETS: Record<UiVersion, SelectorSet> = {
  classic: classicDiscordSelectors,
};

export const KNOWN_UI_VERSIONS: readonly UiVersion[] = ['classic'];

export const DEFAULT_UI_VERSION: UiVersion = 'classic';

export function isUiVersion(value: string): value is UiVersion {
  return KNOWN_UI_VERSIONS.some((known) => known === value);
}

export class SelectorRegistry {
  private selectors: Map<string, Selector> = new Map();
  private version: UiVersion;
  private platform: Platform = 'discord';

  constructor(version: string = DEFAULT_UI_VERSION) {
    if (!isUiVersion(version)) {
      throw new UnknownUiVersionError(version);
    }
    this.version = version;
    this.loadSelectors(SELECTOR_SETS[version]);
  }

  get(path: string): string {
    return this.getSelector(path).primary;
  }

  getWithFallbacks(path: string): string[] {
    const selector = this.getSelector(path);
    return [selector.primary, ...selector.fallbacks];
  }

  /**
   * Primary and fallbacks joined into one selector list, so a single
   * query matches whichever variant the page renders.
   */
  css(path: string): string {
    return this.getWithFallbacks(path).join(', ');
  }

  getSelector(path: string): Selector {
    const selector = this.selectors.get(this.qualify(path));
    if (!selector) {
      throw new SelectorNotFoundError(path);
    }
    return selector;
  }

  getContract(path: string): SelectorContract {
    return this.getSelector(path).contract;
  }

  has(path: string): boolean {
    return this.selectors.has(this.qualify(path));
  }

  getVersion(): UiVersion {
    return this.version;
  }

  getAllPaths(): string[] {
    return Array.from(this.selectors.keys());
  }

  getPathsForGroup(group: string): string[] {
    return this.getAllPaths().filter((path) => path.startsWith(`${this.platform}.${group}.`));
  }

  /**
   * Resolves `{ name: 'group.element' }` into `{ name: cssList }`.
   * Only `css` selectors may be resolved this way, since the result is
   * handed to in-page extractors that use `querySelectorAll`.
   */
  resolvePaths<K extends string>(paths: Record<K, string>): Record<K, string> {
    const resolved = { ...paths };
    for (const name in paths) {
      const path = paths[name];
      if (this.getSelector(path).type !== 'css') {
        throw new Error(`Selector ${path} is not a plain CSS selector`);
      }
      resolved[name] = this.css(path);
    }
    return resolved;
  }

  private qualify(path: string): string {
    return path.startsWith(`${this.platform}.`) ? path : `${this.platform}.${path}`;
  }

  private loadSelectors(set: SelectorSet): void {
    for (const [group, selectors] of Object.entries(set)) {
      for (const [element, selector] of Object.entries(selectors)) {
        this.selectors.set(`${this.platform}.${group}.${element}`, selector);
      }
    }
  }
}
