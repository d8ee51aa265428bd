/**
 * Cookie Store
 *
 * Persists the browser storage state (cookies + localStorage) to a single
 * local file. Operations run one at a time; writes go to a temp file that is
 * renamed over the target so a crash never leaves a half-written session.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { StoredBrowserState, StoredCookie, StoredOrigin } from './browser-controller.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cookie-store');

export const SESSION_FILE_VERSION = 1;

interface SessionEnvelope {
  version: number;
  savedAt: string;
  state: StoredBrowserState;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCookie(value: unknown): value is StoredCookie {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.value === 'string' &&
    typeof value.domain === 'string' &&
    typeof value.path === 'string' &&
    typeof value.expires === 'number' &&
    typeof value.httpOnly === 'boolean' &&
    typeof value.secure === 'boolean' &&
    (value.sameSite === 'Strict' || value.sameSite === 'Lax' || value.sameSite === 'None')
  );
}

function isOrigin(value: unknown): value is StoredOrigin {
  return (
    isRecord(value) &&
    typeof value.origin === 'string' &&
    Array.isArray(value.localStorage) &&
    value.localStorage.every(
      (entry) => isRecord(entry) && typeof entry.name === 'string' && typeof entry.value === 'string',
    )
  );
}

export function isStoredBrowserState(value: unknown): value is StoredBrowserState {
  return (
    isRecord(value) &&
    Array.isArray(value.cookies) &&
    value.cookies.every(isCookie) &&
    Array.isArray(value.origins) &&
    value.origins.every(isOrigin)
  );
}

/** Relative paths resolve against the home directory. */
export function resolveSessionPath(file: string): string {
  return path.isAbsolute(file) ? file : path.join(os.homedir(), file);
}

export class CookieStore {
  readonly filePath: string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(file: string) {
    this.filePath = resolveSessionPath(file);
  }

  /**
   * Reads the stored state. A missing file means "no session", and so does
   * one that is corrupt or of another version, which is logged. Any other
   * read failure is raised.
   */
  load(): Promise<StoredBrowserState | null> {
    return this.serialize(async () => {
      let raw: string;
      try {
        raw = await fs.readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (isNotFound(error)) {
          log.debug(`No session file at ${this.filePath}`);
          return null;
        }
        throw error;
      }
      try {
        const parsed: unknown = JSON.parse(raw);
        if (isRecord(parsed) && parsed.version === SESSION_FILE_VERSION && isStoredBrowserState(parsed.state)) {
          return parsed.state;
        }
        log.warn(`Session file ${this.filePath} has an unexpected shape, ignoring it`);
      } catch (error) {
        log.warn(`Session file ${this.filePath} is corrupt, ignoring it: ${String(error)}`);
      }
      return null;
    });
  }

  save(state: StoredBrowserState): Promise<void> {
    return this.serialize(async () => {
      const envelope: SessionEnvelope = {
        version: SESSION_FILE_VERSION,
        savedAt: new Date().toISOString(),
        state,
      };
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
      try {
        await fs.writeFile(tmp, JSON.stringify(envelope, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tmp, this.filePath);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
      log.info(`Session saved to ${this.filePath} (${state.cookies.length} cookies)`);
    });
  }

  clear(): Promise<void> {
    return this.serialize(async () => {
      await fs.rm(this.filePath, { force: true });
      log.info(`Session file ${this.filePath} removed`);
    });
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation, operation);
    this.tail = run.catch(() => undefined);
    return run;
  }
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
