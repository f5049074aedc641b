import type { Attributes, RawBlock, TmxDocument, TranslationUnit } from '../../types/tmx';
import { plainText } from '../../utils/text-runs';
import { getUnit } from './tmx-document';

export interface LanguagePair {
  source: string | null;
  target: string | null;
}

export interface DocumentSummary {
  totalUnits: number;
  modifiedUnits: number;
  /** Every variant language, in first-seen order */
  languages: string[];
  sourceLanguage: string | null;
  targetLanguage: string | null;
  headerAttributes: Attributes;
  notes: string[];
  /** prop type → value; a later prop of the same type wins */
  properties: Record<string, string>;
}

export interface VariantDescription {
  language: string;
  text: string;
  notes: string[];
  properties: Record<string, string>;
}

export interface UnitDescription {
  tuid: string | null;
  attributes: Attributes;
  notes: string[];
  properties: Record<string, string>;
  variants: VariantDescription[];
}

function notesOf(blocks: readonly RawBlock[]): string[] {
  return blocks.filter((b) => b.name === 'note' && b.text !== '').map((b) => b.text);
}

function propertiesOf(blocks: readonly RawBlock[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const block of blocks) {
    if (block.name === 'prop' && block.text !== '') out[block.attributes.type ?? 'unknown'] = block.text;
  }
  return out;
}

/**
 * Source and target languages to show side by side. The header's srclang
 * counts only if the first unit carries it.
 */
export function determineLanguages(doc: TmxDocument): LanguagePair {
  const first = doc.order.length > 0 ? getUnit(doc, doc.order[0]) : undefined;
  if (!first || first.variants.length === 0) return { source: null, target: null };

  const languages = first.variants.map((v) => v.language);
  const declared = doc.header.attributes.srclang?.toLowerCase();
  const source = languages.find((l) => l.toLowerCase() === declared) ?? languages[0];
  const target = languages.find((l) => l !== source) ?? source;
  return { source, target };
}

export function summarizeDocument(doc: TmxDocument): DocumentSummary {
  const seen = new Map<string, string>();
  let modifiedUnits = 0;
  for (const unit of doc.units.values()) {
    if (unit.dirty) modifiedUnits++;
    for (const variant of unit.variants) {
      const key = variant.language.toLowerCase();
      if (!seen.has(key)) seen.set(key, variant.language);
    }
  }
  const { source, target } = determineLanguages(doc);
  return {
    totalUnits: doc.order.length,
    modifiedUnits,
    languages: [...seen.values()],
    sourceLanguage: source,
    targetLanguage: target,
    headerAttributes: doc.header.attributes,
    notes: notesOf(doc.header.blocks),
    properties: propertiesOf(doc.header.blocks),
  };
}

export function describeUnit(unit: TranslationUnit): UnitDescription {
  return {
    tuid: unit.attributes.tuid ?? null,
    attributes: unit.attributes,
    notes: notesOf(unit.blocks),
    properties: propertiesOf(unit.blocks),
    variants: unit.variants.map((variant) => ({
      language: variant.language,
      text: plainText(variant.content),
      notes: notesOf(variant.blocks),
      properties: propertiesOf(variant.blocks),
    })),
  };
}
