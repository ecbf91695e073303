/**
 * Preferences Store
 *
 * Zustand store for the user-adjustable run settings: provider, model, prompt,
 * temperature and capture region. Seeded from Settings and persisted to a JSON
 * file so choices survive restarts.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type { Settings } from '../config/settings';
import { createLogger, describeError } from '../logging/logger';
import { getProviderById } from '../providers/registry';
import type { CaptureRegion, RegionMode } from '../vision/types';

const log = createLogger('preferences');

const PERSIST_KEY = 'preferences';

export interface Preferences {
  providerId: string;
  model: string;
  /** Prompt template name; the built-in default when absent */
  promptName?: string;
  temperature: number;
  regionMode: RegionMode;
  /** Stored region used in manual mode, replaced after each interactive selection */
  region: CaptureRegion;
}

interface PreferencesStore extends Preferences {
  /** Actions */
  setProvider: (providerId: string, model?: string) => void;
  setModel: (model: string) => void;
  setPromptName: (promptName: string | undefined) => void;
  setTemperature: (temperature: number) => void;
  setRegionMode: (mode: RegionMode) => void;
  rememberRegion: (region: CaptureRegion) => void;
}

const persistedSchema = z
  .object({
    providerId: z.string().refine((id) => getProviderById(id) !== undefined),
    model: z.string().min(1),
    promptName: z.string().min(1),
    temperature: z.number().min(0).max(2),
    regionMode: z.enum(['manual', 'interactive']),
    region: z.object({
      left: z.number().int(),
      top: z.number().int(),
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    }),
  })
  .partial();

/**
 * zustand StateStorage over one JSON file holding every persisted key.
 * Writes are chained so they land in call order.
 */
export function createFileStorage(filePath: string): StateStorage {
  let pending: Promise<void> = Promise.resolve();

  const readAll = async (): Promise<Record<string, string>> => {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn(`Ignoring unreadable preferences file ${filePath}`, { error: describeError(error) });
      return {};
    }
    const parsed = z.record(z.string()).safeParse(json);
    if (!parsed.success) {
      log.warn(`Ignoring malformed preferences file ${filePath}`);
      return {};
    }
    return parsed.data;
  };

  const update = (change: (entries: Record<string, string>) => void): Promise<void> => {
    pending = pending
      .then(async () => {
        const entries = await readAll();
        change(entries);
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
      })
      .catch((error: unknown) => {
        log.error(`Failed to save preferences to ${filePath}`, { error: describeError(error) });
      });
    return pending;
  };

  return {
    getItem: async (name) => (await readAll())[name] ?? null,
    setItem: (name, value) =>
      update((entries) => {
        entries[name] = value;
      }),
    removeItem: (name) =>
      update((entries) => {
        delete entries[name];
      }),
  };
}

export function defaultPreferences(settings: Settings): Preferences {
  return {
    providerId: settings.ai.provider,
    model: settings.ai.model,
    ...(settings.ai.promptName ? { promptName: settings.ai.promptName } : {}),
    temperature: settings.ai.temperature,
    regionMode: settings.capture.regionMode,
    region: { ...settings.capture.region },
  };
}

export function createPreferencesStore(defaults: Preferences, storage: StateStorage) {
  return createStore<PreferencesStore>()(
    persist(
      (set) => ({
        ...defaults,

        setProvider: (providerId, model) => {
          const config = getProviderById(providerId);
          if (!config) {
            log.warn(`Unknown provider "${providerId}" ignored`);
            return;
          }
          set({ providerId, model: model ?? config.defaultModel });
        },

        setModel: (model) => set({ model }),

        setPromptName: (promptName) => set({ promptName }),

        setTemperature: (temperature) => set({ temperature: Math.min(2, Math.max(0, temperature)) }),

        setRegionMode: (regionMode) => set({ regionMode }),

        rememberRegion: (region) => set({ region: { ...region } }),
      }),
      {
        name: PERSIST_KEY,
        version: 1,
        storage: createJSONStorage(() => storage),
        skipHydration: true,
        partialize: (state): Preferences => ({
          providerId: state.providerId,
          model: state.model,
          ...(state.promptName ? { promptName: state.promptName } : {}),
          temperature: state.temperature,
          regionMode: state.regionMode,
          region: state.region,
        }),
        merge: (persisted, current) => {
          if (persisted === undefined || persisted === null) return current;
          const parsed = persistedSchema.safeParse(persisted);
          if (!parsed.success) {
            log.warn('Stored preferences are invalid, using defaults');
            return current;
          }
          return { ...current, ...parsed.data };
        },
      }
    )
  );
}

export type PreferencesStoreApi = ReturnType<typeof createPreferencesStore>;

/**
 * Build the store and load whatever was persisted
 */
export async function loadPreferences(settings: Settings): Promise<PreferencesStoreApi> {
  const store = createPreferencesStore(defaultPreferences(settings), createFileStorage(settings.files.preferencesFile));
  await store.persist.rehydrate();
  log.debug('Preferences loaded', { provider: store.getState().providerId, model: store.getState().model });
  return store;
}

/**
 * The values a run uses, read once at its start
 */
export function snapshotPreferences(state: Preferences): Preferences {
  return {
    providerId: state.providerId,
    model: state.model,
    ...(state.promptName ? { promptName: state.promptName } : {}),
    temperature: state.temperature,
    regionMode: state.regionMode,
    region: { ...state.region },
  };
}
