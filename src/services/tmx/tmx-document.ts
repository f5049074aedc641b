import type { Attributes, Header, RawBlock, Segment, TextRun, TmxDocument, TranslationUnit, UnitId } from '../../types/tmx';
import { generateId } from '../../utils/id-generator';

export const DEFAULT_XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export interface VariantInit {
  language: string;
  content: TextRun[];
  attributes?: Attributes;
  blocks?: RawBlock[];
}

export interface UnitInit {
  attributes?: Attributes;
  blocks?: RawBlock[];
  variants: VariantInit[];
}

export interface DocumentInit {
  header?: Partial<Header>;
  units?: UnitInit[];
  filePath?: string | null;
}

/** A variant built in memory; `xml:lang` leads its attributes unless given */
export function createSegment(init: VariantInit): Segment {
  const attributes = init.attributes ?? { 'xml:lang': init.language };
  return { language: init.language, attributes, blocks: init.blocks ?? [], content: init.content, source: null };
}

export function createUnit(init: UnitInit): TranslationUnit {
  const seen = new Set<string>();
  for (const variant of init.variants) {
    const lang = variant.language.toLowerCase();
    if (seen.has(lang)) throw new Error(`Duplicate variant language: ${variant.language}`);
    seen.add(lang);
  }
  return {
    id: generateId('tu'),
    attributes: init.attributes ?? {},
    blocks: init.blocks ?? [],
    variants: init.variants.map(createSegment),
    dirty: false,
    originalSnapshot: null,
    source: null,
  };
}

/**
 * Build a document in memory. It has no source layout, so the writer
 * serializes it with canonical formatting.
 */
export function createDocument(init: DocumentInit = {}): TmxDocument {
  const units = (init.units ?? []).map(createUnit);
  return {
    id: generateId('doc'),
    header: {
      attributes: init.header?.attributes ?? {},
      blocks: init.header?.blocks ?? [],
    },
    rootAttributes: { version: '1.4' },
    order: units.map((u) => u.id),
    units: new Map(units.map((u) => [u.id, u])),
    sourceEncoding: 'utf-8',
    bom: false,
    xmlDeclaration: DEFAULT_XML_DECLARATION,
    layout: null,
    dirty: false,
    filePath: init.filePath ?? null,
  };
}

/** Units in document order */
export function listUnits(doc: TmxDocument): TranslationUnit[] {
  const out: TranslationUnit[] = [];
  for (const id of doc.order) {
    const unit = doc.units.get(id);
    if (unit) out.push(unit);
  }
  return out;
}

export function getUnit(doc: TmxDocument, id: UnitId): TranslationUnit | undefined {
  return doc.units.get(id);
}
