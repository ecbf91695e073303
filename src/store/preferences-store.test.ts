import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseSettings } from '../config/settings';
import {
  createFileStorage,
  createPreferencesStore,
  defaultPreferences,
  snapshotPreferences,
  type Preferences,
} from './preferences-store';

const defaults: Preferences = defaultPreferences(parseSettings({}));

describe('preferences store', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prefs-'));
    file = join(dir, 'nested', 'preferences.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('is seeded from settings', () => {
    expect(defaults).toEqual({
      providerId: 'openai',
      model: 'gpt-4o-mini',
      temperature: 0,
      regionMode: 'manual',
      region: { left: 40, top: 40, width: 1200, height: 700 },
    });
  });

  it('keeps defaults when nothing is stored', async () => {
    const store = createPreferencesStore(defaults, createFileStorage(file));
    await store.persist.rehydrate();
    expect(snapshotPreferences(store.getState())).toEqual(defaults);
  });

  it('survives a restart', async () => {
    const storage = createFileStorage(file);
    const first = createPreferencesStore(defaults, storage);
    await first.persist.rehydrate();

    first.getState().setProvider('anthropic');
    first.getState().rememberRegion({ left: 5, top: 6, width: 300, height: 200 });
    await storage.setItem('flush-marker', '1');

    const second = createPreferencesStore(defaults, createFileStorage(file));
    await second.persist.rehydrate();

    expect(second.getState().providerId).toBe('anthropic');
    expect(second.getState().model).toBe('claude-3-5-sonnet-20240620');
    expect(second.getState().region).toEqual({ left: 5, top: 6, width: 300, height: 200 });
  });

  it('ignores an unknown provider', () => {
    const store = createPreferencesStore(defaults, createFileStorage(file));
    store.getState().setProvider('nope');
    expect(store.getState().providerId).toBe('openai');
  });

  it('clamps temperature', () => {
    const store = createPreferencesStore(defaults, createFileStorage(file));
    store.getState().setTemperature(5);
    expect(store.getState().temperature).toBe(2);
  });

  it('falls back to defaults when the stored values are invalid', async () => {
    await createFileStorage(file).setItem(
      'preferences',
      JSON.stringify({ state: { providerId: 'nope', temperature: 9 }, version: 1 })
    );

    const store = createPreferencesStore(defaults, createFileStorage(file));
    await store.persist.rehydrate();
    expect(store.getState().providerId).toBe('openai');
    expect(store.getState().temperature).toBe(0);
  });

  it('treats an unreadable file as empty', async () => {
    const storage = createFileStorage(join(dir, 'broken.json'));
    await writeFile(join(dir, 'broken.json'), '{not json', 'utf8');
    expect(await storage.getItem('preferences')).toBeNull();
  });

  it('writes each key into one JSON file', async () => {
    const storage = createFileStorage(file);
    await storage.setItem('a', '1');
    await storage.setItem('b', '2');
    await storage.removeItem('a');
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({ b: '2' });
  });
});
