import type { ProgressSink } from '../../types/tmx';
import type { AtomicWriteOptions } from '../file-system/file-writer';
import { createDocumentStore, type DocumentStore } from '../../stores/document-store';
import type { SettingsStore } from '../../stores/settings-store';
import { parseTmxFile } from './tmx-parser';
import { writeTmx } from './tmx-writer';
import { WriteError } from '../../types/errors';

export interface OpenOptions {
  signal?: AbortSignal;
  onProgress?: ProgressSink;
  /** Supplies the read chunk size and records the file as recently used */
  settings?: SettingsStore;
}

export interface SaveOptions extends AtomicWriteOptions {
  settings?: SettingsStore;
}

async function readDocument(filePath: string, { settings, ...options }: OpenOptions) {
  const doc = await parseTmxFile(filePath, { ...options, chunkSize: settings?.getState().readChunkSize });
  settings?.getState().addRecentFile(filePath);
  return doc;
}

/** Parse a file into a new document store */
export async function openTmxFile(filePath: string, options: OpenOptions = {}): Promise<DocumentStore> {
  return createDocumentStore(await readDocument(filePath, options));
}

/**
 * Parse a file and swap it into an existing store. The store is only
 * touched once the parse has succeeded.
 */
export async function openTmxFileInto(store: DocumentStore, filePath: string, options: OpenOptions = {}): Promise<void> {
  const doc = await readDocument(filePath, options);
  store.getState().loadDocument(doc);
}

/**
 * Write the store's document to `targetPath`, or back to the file it came
 * from. Edits are refused while the write runs; on failure the document keeps
 * its dirty state.
 */
export async function saveTmxFile(store: DocumentStore, targetPath?: string, options: SaveOptions = {}): Promise<string> {
  const { settings, ...writeOptions } = options;
  const target = targetPath ?? store.getState().document.filePath;
  if (!target) throw new WriteError('io', 'The document has no file path; pass a target path to save it');

  const doc = store.getState().commitAll();
  try {
    await writeTmx(doc, target, writeOptions);
  } catch (err) {
    store.getState().abortCommit();
    throw err;
  }
  store.getState().acknowledgeSaved(target);
  settings?.getState().addRecentFile(target);
  return target;
}
