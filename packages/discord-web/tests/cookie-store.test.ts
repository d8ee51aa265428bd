/**
 * Cookie Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { StoredBrowserState } from '../src/automation/browser-controller.js';
import { CookieStore, SESSION_FILE_VERSION, resolveSessionPath } from '../src/automation/cookie-store.js';

function stateWithToken(token: string): StoredBrowserState {
  return {
    cookies: [
      {
        name: 'session',
        value: token,
        domain: '.example.com',
        path: '/',
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: 'Lax',
      },
    ],
    origins: [{ origin: 'https://example.com', localStorage: [{ name: 'token', value: token }] }],
  };
}

describe('CookieStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cookie-store-'));
    file = path.join(dir, 'nested', 'session.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null when no session was saved', async () => {
    expect(await new CookieStore(file).load()).toBeNull();
  });

  it('raises read failures other than a missing file', async () => {
    await expect(new CookieStore(dir).load()).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('saves and loads the browser state', async () => {
    const store = new CookieStore(file);
    await store.save(stateWithToken('test-token'));

    expect(await store.load()).toEqual(stateWithToken('test-token'));
    const envelope: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(envelope).toMatchObject({ version: SESSION_FILE_VERSION });
  });

  it('ignores a corrupt file', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{"version": 1, "state": ');
    expect(await new CookieStore(file).load()).toBeNull();
  });

  it('ignores a file from another version', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ version: 99, state: stateWithToken('old') }));
    expect(await new CookieStore(file).load()).toBeNull();
  });

  it('ignores a file with the wrong shape', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ version: 1, state: { cookies: [{ name: 'session' }], origins: [] } }));
    expect(await new CookieStore(file).load()).toBeNull();
  });

  it('keeps the last of several concurrent saves and leaves no temp files', async () => {
    const store = new CookieStore(file);
    await Promise.all([
      store.save(stateWithToken('one')),
      store.save(stateWithToken('two')),
      store.save(stateWithToken('three')),
    ]);

    expect(await store.load()).toEqual(stateWithToken('three'));
    expect(await fs.readdir(path.dirname(file))).toEqual(['session.json']);
  });

  it('clears the stored session', async () => {
    const store = new CookieStore(file);
    await store.save(stateWithToken('test-token'));
    await store.clear();

    expect(await store.load()).toBeNull();
    await expect(store.clear()).resolves.toBeUndefined();
  });
});

describe('resolveSessionPath', () => {
  it('keeps absolute paths and puts relative ones under the home directory', () => {
    expect(resolveSessionPath('/tmp/session.json')).toBe('/tmp/session.json');
    expect(resolveSessionPath('.discord_web_session.json')).toBe(path.join(os.homedir(), '.discord_web_session.json'));
  });
});
