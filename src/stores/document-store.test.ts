import { describe, expect, it } from 'vitest';
import { createDocumentStore, redo, undo, type DocumentStore } from './document-store';
import { createDocument } from '../services/tmx/tmx-document';
import { serializeTmx } from '../services/tmx/tmx-writer';
import { EditError } from '../types/errors';
import type { TmxDocument } from '../types/tmx';
import { fromPlainText, plainText, runsEqual } from '../utils/text-runs';
import { SAMPLE_TMX, parseString } from '../test/fixtures';

function sampleDocument(): TmxDocument {
  const pair = (tuid: string, en: string, fr: string) => ({
    attributes: { tuid },
    variants: [
      { language: 'en', content: fromPlainText(en) },
      { language: 'fr', content: fromPlainText(fr) },
    ],
  });
  return createDocument({ units: [pair('1', 'Hello', 'Bonjour'), pair('2', 'Yes', 'Oui'), pair('3', 'No', 'Non')] });
}

function editFailure(action: () => unknown): EditError {
  try {
    action();
  } catch (err) {
    if (err instanceof EditError) return err;
    throw err;
  }
  throw new Error('Expected an EditError');
}

function textOf(store: DocumentStore, index: number, language: string): string {
  const { document, getVariant } = store.getState();
  const variant = getVariant(document.order[index], language);
  return variant ? plainText(variant.content) : '';
}

/** Unit dirty iff a variant differs from its snapshot; document dirty iff a unit is */
function expectDirtyInvariant(doc: TmxDocument): void {
  let anyDirty = false;
  for (const unit of doc.units.values()) {
    const snapshot = unit.originalSnapshot;
    const differs =
      snapshot !== null &&
      unit.variants.some((v) => {
        const original = snapshot.find((o) => o.language === v.language);
        return !original || !runsEqual(original.content, v.content);
      });
    expect(unit.dirty).toBe(differs);
    anyDirty ||= unit.dirty;
  }
  expect(doc.dirty).toBe(anyDirty);
}

describe('document store', () => {
  it('opens edit sessions against the current document', () => {
    const store = createDocumentStore(sampleDocument());
    const { document, beginEdit } = store.getState();

    const session = beginEdit(document.order[0], 'FR');

    expect(session).toEqual({ documentId: document.id, unitId: document.order[0], language: 'fr' });
  });

  it('refuses a language the unit does not have', () => {
    const store = createDocumentStore(sampleDocument());
    const { document, beginEdit } = store.getState();

    expect(editFailure(() => beginEdit(document.order[0], 'de')).kind).toBe('language-mismatch');
  });

  it('refuses an unknown unit as a stale session', () => {
    const store = createDocumentStore(sampleDocument());
    expect(editFailure(() => store.getState().beginEdit('tu_missing', 'en')).kind).toBe('stale-session');
  });

  it('marks the unit and the document dirty and keeps the first snapshot', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const original = state.document.units.get(state.document.order[0])?.variants;
    const session = state.beginEdit(state.document.order[0], 'fr');

    state.applyEdit(session, 'Salut');
    state.applyEdit(session, 'Coucou');

    const unit = store.getState().getUnit(session.unitId);
    expect(unit?.dirty).toBe(true);
    expect(unit?.originalSnapshot).toBe(original);
    expect(store.getState().document.dirty).toBe(true);
    expect(store.getState().modifiedCount()).toBe(1);
    expect(textOf(store, 0, 'fr')).toBe('Coucou');
  });

  it('is clean again when an edit restores the original text', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const session = state.beginEdit(state.document.order[1], 'en');

    state.applyEdit(session, 'Maybe');
    state.applyEdit(session, 'Yes');

    expect(store.getState().getUnit(session.unitId)?.dirty).toBe(false);
    expect(store.getState().document.dirty).toBe(false);
    expect(store.getState().modifiedCount()).toBe(0);
  });

  it('restores a discarded variant from the snapshot', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const unitId = state.document.order[2];
    const before = state.getVariant(unitId, 'fr');
    const fr = state.beginEdit(unitId, 'fr');
    const en = state.beginEdit(unitId, 'en');

    state.applyEdit(fr, 'Jamais');
    state.applyEdit(en, 'Never');
    state.discardEdit(fr);

    expect(store.getState().getVariant(unitId, 'fr')).toBe(before);
    expect(store.getState().getUnit(unitId)?.dirty).toBe(true);

    state.discardEdit(en);

    const unit = store.getState().getUnit(unitId);
    expect(unit?.dirty).toBe(false);
    expect(unit?.originalSnapshot).toBeNull();
    expect(store.getState().document.dirty).toBe(false);
  });

  it('holds the dirty invariant through a run of edits and discards', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const ids = state.document.order;
    const steps: [number, string, string | null][] = [
      [0, 'en', 'Hi'],
      [1, 'fr', 'Si'],
      [0, 'en', null],
      [2, 'en', 'Nope'],
      [1, 'fr', 'Oui'],
      [2, 'fr', 'Non plus'],
      [2, 'en', null],
      [0, 'fr', ''],
    ];

    for (const [index, language, text] of steps) {
      const session = state.beginEdit(ids[index], language);
      if (text === null) state.discardEdit(session);
      else state.applyEdit(session, text);
      expectDirtyInvariant(store.getState().document);
    }
    expect(store.getState().modifiedCount()).toBe(2);
  });

  it('refuses text with characters XML cannot carry', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const session = state.beginEdit(state.document.order[0], 'en');

    const bell = editFailure(() => state.applyEdit(session, 'bell\u0007'));
    expect(bell.kind).toBe('invalid-character');
    expect(bell.message).toContain('U+0007');
    expect(editFailure(() => state.applyEdit(session, 'half \uDC00')).kind).toBe('invalid-character');

    expect(store.getState().document.dirty).toBe(false);
    expect(textOf(store, 0, 'en')).toBe('Hello');

    state.applyEdit(session, 'tab\tand\nnewline \u{1F600}');
    expect(textOf(store, 0, 'en')).toBe('tab\tand\nnewline \u{1F600}');
  });

  it('refuses edits while a write is pending and resumes after an abort', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const session = state.beginEdit(state.document.order[0], 'en');
    state.applyEdit(session, 'Hi');

    const committed = state.commitAll();

    expect(committed).toBe(store.getState().document);
    expect(editFailure(() => state.applyEdit(session, 'Hey')).kind).toBe('write-in-progress');
    expect(editFailure(() => state.commitAll()).kind).toBe('write-in-progress');
    expect(editFailure(() => undo(store)).kind).toBe('write-in-progress');

    state.abortCommit();

    expect(store.getState().document.dirty).toBe(true);
    state.applyEdit(session, 'Hey');
    expect(textOf(store, 0, 'en')).toBe('Hey');
  });

  it('starts a new baseline once a save is acknowledged', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    state.applyEdit(state.beginEdit(state.document.order[0], 'en'), 'Hi');

    state.commitAll();
    state.acknowledgeSaved('/data/memory.tmx');

    const after = store.getState();
    expect(after.pendingWrite).toBe(false);
    expect(after.document.dirty).toBe(false);
    expect(after.document.filePath).toBe('/data/memory.tmx');
    expect(after.lastSavedAt).toEqual(expect.any(Number));
    expect(after.getUnit(after.document.order[0])?.originalSnapshot).toBeNull();
    expect(textOf(store, 0, 'en')).toBe('Hi');
    expect(store.temporal.getState().pastStates).toHaveLength(0);
  });

  it('keeps earlier edits in the output of a later save', async () => {
    const store = createDocumentStore(await parseString(SAMPLE_TMX));
    const state = store.getState();
    const ids = state.document.order;

    state.applyEdit(state.beginEdit(ids[0], 'fr'), 'Salut');
    state.commitAll();
    state.acknowledgeSaved();
    state.applyEdit(state.beginEdit(ids[0], 'en'), 'Hi');
    state.applyEdit(state.beginEdit(ids[2], 'en'), 'Bye');

    expect(serializeTmx(store.getState().document)).toBe(
      SAMPLE_TMX.replace('<seg>Bonjour</seg>', '<seg>Salut</seg>')
        .replace('<seg>Hello</seg>', '<seg>Hi</seg>')
        .replace('<seg>Goodbye</seg>', '<seg>Bye</seg>')
    );
  });

  it('invalidates sessions of a replaced document', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const session = state.beginEdit(state.document.order[0], 'en');

    state.loadDocument(sampleDocument());

    expect(editFailure(() => state.applyEdit(session, 'Hi')).kind).toBe('stale-session');
    expect(store.getState().document.dirty).toBe(false);
  });

  it('steps back and forward through edits', () => {
    const store = createDocumentStore(sampleDocument());
    const state = store.getState();
    const session = state.beginEdit(state.document.order[0], 'fr');
    state.applyEdit(session, 'Salut');
    state.applyEdit(session, 'Coucou');

    expect(undo(store)).toBe(true);
    expect(textOf(store, 0, 'fr')).toBe('Salut');
    expect(undo(store)).toBe(true);
    expect(textOf(store, 0, 'fr')).toBe('Bonjour');
    expect(store.getState().document.dirty).toBe(false);
    expect(undo(store)).toBe(false);

    expect(redo(store)).toBe(true);
    expect(textOf(store, 0, 'fr')).toBe('Salut');
    expect(store.getState().document.dirty).toBe(true);
  });
});
