import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist } from 'zustand/middleware';
import type { StateStorage } from 'zustand/middleware';
import { DEFAULT_PAGE_SIZE, DEFAULT_READ_CHUNK_SIZE, MAX_RECENT_FILES, SETTINGS_STORAGE_NAME } from '../constants/defaults';
import { createMemoryStorage } from '../services/file-system/settings-storage';

export interface PersistedSettings {
  pageSize: number;
  readChunkSize: number;
  /** Most recent first */
  recentFiles: string[];
}

export interface SettingsState extends PersistedSettings {
  setPageSize: (size: number) => void;
  setReadChunkSize: (size: number) => void;
  addRecentFile: (filePath: string) => void;
  removeRecentFile: (filePath: string) => void;
  clearRecentFiles: () => void;
}

export interface SettingsOptions {
  /** Defaults to in-memory storage */
  storage?: StateStorage;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Keep only the well-formed fields of a persisted settings object */
function sanitize(persisted: unknown): Partial<PersistedSettings> {
  if (!persisted || typeof persisted !== 'object') return {};
  const out: Partial<PersistedSettings> = {};
  if ('pageSize' in persisted && isPositiveInteger(persisted.pageSize)) out.pageSize = persisted.pageSize;
  if ('readChunkSize' in persisted && isPositiveInteger(persisted.readChunkSize)) {
    out.readChunkSize = persisted.readChunkSize;
  }
  if ('recentFiles' in persisted && Array.isArray(persisted.recentFiles)) {
    out.recentFiles = persisted.recentFiles
      .filter((f: unknown): f is string => typeof f === 'string')
      .slice(0, MAX_RECENT_FILES);
  }
  return out;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!isPositiveInteger(value)) throw new RangeError(`${name} must be a positive integer, got ${value}`);
}

export function createSettingsStore(options: SettingsOptions = {}) {
  const storage = options.storage ?? createMemoryStorage();

  return createStore<SettingsState>()(
    persist<SettingsState, [], [], PersistedSettings>(
      (set) => ({
        pageSize: DEFAULT_PAGE_SIZE,
        readChunkSize: DEFAULT_READ_CHUNK_SIZE,
        recentFiles: [],

        setPageSize: (size) => {
          assertPositiveInteger('Page size', size);
          set({ pageSize: size });
        },
        setReadChunkSize: (size) => {
          assertPositiveInteger('Read chunk size', size);
          set({ readChunkSize: size });
        },
        addRecentFile: (filePath) =>
          set((s) => ({
            recentFiles: [filePath, ...s.recentFiles.filter((f) => f !== filePath)].slice(0, MAX_RECENT_FILES),
          })),
        removeRecentFile: (filePath) => set((s) => ({ recentFiles: s.recentFiles.filter((f) => f !== filePath) })),
        clearRecentFiles: () => set({ recentFiles: [] }),
      }),
      {
        name: SETTINGS_STORAGE_NAME,
        storage: createJSONStorage<PersistedSettings>(() => storage),
        partialize: (state) => ({
          pageSize: state.pageSize,
          readChunkSize: state.readChunkSize,
          recentFiles: state.recentFiles,
        }),
        merge: (persisted, current) => ({ ...current, ...sanitize(persisted) }),
        onRehydrateStorage: () => (_state, error) => {
          if (error) console.error('[tmx] Failed to load settings:', error);
        },
      }
    )
  );
}

export type SettingsStore = ReturnType<typeof createSettingsStore>;
