import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import type { Segment, TmxDocument, TranslationUnit, UnitId } from '../types/tmx';
import { EditError } from '../types/errors';
import { UNDO_LIMIT } from '../constants/defaults';
import { findVariant, fromPlainText, runsEqual } from '../utils/text-runs';
import { describeChar, findDisallowedChar } from '../utils/xml';
import { rebaseUnit } from '../services/tmx/tmx-writer';

/** Identifies one variant of one unit of one document; a value, not a lock */
export interface EditSession {
  readonly documentId: string;
  readonly unitId: UnitId;
  readonly language: string;
}

export interface DocumentState {
  document: TmxDocument;
  /** Set between commitAll and acknowledgeSaved/abortCommit; edits are refused meanwhile */
  pendingWrite: boolean;
  lastSavedAt: number | null;

  // Edit operations
  beginEdit: (unitId: UnitId, language: string) => EditSession;
  applyEdit: (session: EditSession, text: string) => void;
  discardEdit: (session: EditSession) => void;

  // Save handshake
  commitAll: () => TmxDocument;
  acknowledgeSaved: (filePath?: string) => void;
  abortCommit: () => void;

  loadDocument: (document: TmxDocument) => void;

  // Queries
  getUnit: (unitId: UnitId) => TranslationUnit | undefined;
  getVariant: (unitId: UnitId, language: string) => Segment | undefined;
  modifiedCount: () => number;
}

/** The part of the state kept in undo history */
type TrackedState = Pick<DocumentState, 'document'>;

function isDirty(variants: readonly Segment[], snapshot: readonly Segment[] | null): boolean {
  if (!snapshot) return false;
  return variants.some((variant) => {
    const original = findVariant(snapshot, variant.language);
    return !original || !runsEqual(original.content, variant.content);
  });
}

/** Replace one unit, keeping the document's dirty flag in step */
function withUnit(doc: TmxDocument, unit: TranslationUnit): TmxDocument {
  const previous = doc.units.get(unit.id);
  const units = new Map(doc.units);
  units.set(unit.id, unit);

  let dirty = doc.dirty;
  if (unit.dirty) dirty = true;
  else if (previous?.dirty) dirty = [...units.values()].some((u) => u.dirty);
  return { ...doc, units, dirty };
}

function resolve(doc: TmxDocument, session: EditSession): { unit: TranslationUnit; index: number } {
  if (session.documentId !== doc.id) {
    throw new EditError('stale-session', 'Edit session belongs to a document that is no longer loaded');
  }
  const unit = doc.units.get(session.unitId);
  if (!unit) throw new EditError('stale-session', `Unit ${session.unitId} no longer exists`);
  const wanted = session.language.toLowerCase();
  const index = unit.variants.findIndex((v) => v.language.toLowerCase() === wanted);
  if (index < 0) {
    throw new EditError('language-mismatch', `Unit ${session.unitId} has no ${session.language} variant`);
  }
  return { unit, index };
}

export function createDocumentStore(initial: TmxDocument) {
  const store = createStore<DocumentState>()(
    temporal<DocumentState, [], [], TrackedState>(
      (set, get) => {
        const assertWritable = () => {
          if (get().pendingWrite) {
            throw new EditError('write-in-progress', 'The document is being written; try again when the save completes');
          }
        };

        return {
          document: initial,
          pendingWrite: false,
          lastSavedAt: null,

          beginEdit: (unitId, language) => {
            const session: EditSession = { documentId: get().document.id, unitId, language };
            const { unit, index } = resolve(get().document, session);
            return { ...session, language: unit.variants[index].language };
          },

          applyEdit: (session, text) => {
            assertWritable();
            const doc = get().document;
            const { unit, index } = resolve(doc, session);
            const bad = findDisallowedChar(text);
            if (bad >= 0) {
              throw new EditError('invalid-character', `Character ${describeChar(text, bad)} cannot be stored in a TMX file`);
            }
            const content = fromPlainText(text);
            if (runsEqual(unit.variants[index].content, content)) return;

            const originalSnapshot = unit.originalSnapshot ?? unit.variants;
            const variants = unit.variants.map((v, i) => (i === index ? { ...v, content } : v));
            const next = { ...unit, variants, originalSnapshot, dirty: isDirty(variants, originalSnapshot) };
            set({ document: withUnit(doc, next) });
          },

          discardEdit: (session) => {
            assertWritable();
            const doc = get().document;
            const { unit, index } = resolve(doc, session);
            const snapshot = unit.originalSnapshot;
            if (!snapshot) return;
            const original = findVariant(snapshot, unit.variants[index].language);
            if (!original || original === unit.variants[index]) return;

            const variants = unit.variants.map((v, i) => (i === index ? original : v));
            const dirty = isDirty(variants, snapshot);
            const next = { ...unit, variants, dirty, originalSnapshot: dirty ? snapshot : null };
            set({ document: withUnit(doc, next) });
          },

          commitAll: () => {
            assertWritable();
            set({ pendingWrite: true });
            return get().document;
          },

          acknowledgeSaved: (filePath) => {
            const doc = get().document;
            const units = new Map<UnitId, TranslationUnit>();
            for (const [id, unit] of doc.units) units.set(id, rebaseUnit(unit));
            set({
              document: { ...doc, units, dirty: false, filePath: filePath ?? doc.filePath },
              pendingWrite: false,
              lastSavedAt: Date.now(),
            });
            store.temporal.getState().clear();
          },

          abortCommit: () => set({ pendingWrite: false }),

          loadDocument: (document) => {
            assertWritable();
            set({ document, lastSavedAt: null });
            store.temporal.getState().clear();
          },

          getUnit: (unitId) => get().document.units.get(unitId),
          getVariant: (unitId, language) => {
            const unit = get().document.units.get(unitId);
            return unit ? findVariant(unit.variants, language) : undefined;
          },
          modifiedCount: () => {
            let count = 0;
            for (const unit of get().document.units.values()) if (unit.dirty) count++;
            return count;
          },
        };
      },
      {
        limit: UNDO_LIMIT,
        partialize: (state) => ({ document: state.document }),
        equality: (past, current) => past.document === current.document,
      }
    )
  );
  return store;
}

export type DocumentStore = ReturnType<typeof createDocumentStore>;

function assertUnlocked(store: DocumentStore): void {
  if (store.getState().pendingWrite) {
    throw new EditError('write-in-progress', 'Undo and redo are unavailable while the document is being written');
  }
}

/** Step back one edit; returns false when there is nothing to undo */
export function undo(store: DocumentStore): boolean {
  assertUnlocked(store);
  const history = store.temporal.getState();
  if (history.pastStates.length === 0) return false;
  history.undo();
  return true;
}

export function redo(store: DocumentStore): boolean {
  assertUnlocked(store);
  const history = store.temporal.getState();
  if (history.futureStates.length === 0) return false;
  history.redo();
  return true;
}
