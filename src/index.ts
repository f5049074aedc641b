export type * from './types/tmx';
export * from './types/errors';

export { plainText, fromPlainText, runsEqual, serializeRuns, findVariant } from './utils/text-runs';
export { detectEncoding, encodeText, UnencodableError } from './utils/encoding';

export { createDocument, createUnit, createSegment, listUnits, getUnit } from './services/tmx/tmx-document';
export type { DocumentInit, UnitInit, VariantInit } from './services/tmx/tmx-document';
export { parseTmx, parseTmxFile } from './services/tmx/tmx-parser';
export type { ParseOptions } from './services/tmx/tmx-parser';
export { serializeTmx, encodeTmx, writeTmx } from './services/tmx/tmx-writer';
export { writeFileAtomic } from './services/file-system/file-writer';
export type { AtomicWriteOptions } from './services/file-system/file-writer';
export { createFileStorage, createMemoryStorage } from './services/file-system/settings-storage';
export { openTmxFile, openTmxFileInto, saveTmxFile } from './services/tmx/tmx-session';
export type { OpenOptions, SaveOptions } from './services/tmx/tmx-session';
export { determineLanguages, summarizeDocument, describeUnit } from './services/tmx/tmx-summary';
export type { DocumentSummary, LanguagePair, UnitDescription, VariantDescription } from './services/tmx/tmx-summary';

export { createDocumentStore, undo, redo } from './stores/document-store';
export type { DocumentState, DocumentStore, EditSession } from './stores/document-store';
export { createViewStore, filterUnits } from './stores/view-store';
export type { ViewState, ViewStore, ViewOptions } from './stores/view-store';
export { createSettingsStore } from './stores/settings-store';
export type { SettingsState, SettingsStore, PersistedSettings } from './stores/settings-store';
