export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_READ_CHUNK_SIZE = 64 * 1024; // bytes read, and characters parsed, per step

export const MAX_RECENT_FILES = 10;
export const UNDO_LIMIT = 100;

export const SETTINGS_STORAGE_NAME = 'tmx-settings';
