import type { RawBlock, Segment, SegmentSource, TmxDocument, TranslationUnit, UnitSource } from '../../types/tmx';
import { WriteError } from '../../types/errors';
import { encodeText } from '../../utils/encoding';
import { findVariant, runsEqual, serializeRuns } from '../../utils/text-runs';
import { describeChar, findDisallowedChar, serializeAttributes } from '../../utils/xml';
import { writeFileAtomic, type AtomicWriteOptions } from '../file-system/file-writer';
import { listUnits } from './tmx-document';

const INDENT = '  ';

/** Variants whose content differs from the unit's snapshot */
export function editedVariants(unit: TranslationUnit): Segment[] {
  const snapshot = unit.originalSnapshot;
  if (!unit.dirty || !snapshot) return [];
  return unit.variants.filter((variant) => {
    const original = findVariant(snapshot, variant.language);
    return !original || !runsEqual(original.content, variant.content);
  });
}

function blockLines(blocks: RawBlock[], indent: string): string {
  return blocks.map((block) => `${indent}${block.xml}\n`).join('');
}

function canonicalVariant(variant: Segment, indent: string): string {
  const inner = indent + INDENT;
  return (
    `${indent}<tuv${serializeAttributes(variant.attributes)}>\n` +
    blockLines(variant.blocks, inner) +
    `${inner}<seg>${serializeRuns(variant.content)}</seg>\n` +
    `${indent}</tuv>\n`
  );
}

function canonicalUnit(unit: TranslationUnit, indent: string): string {
  const inner = indent + INDENT;
  return (
    `${indent}<tu${serializeAttributes(unit.attributes)}>\n` +
    blockLines(unit.blocks, inner) +
    unit.variants.map((variant) => canonicalVariant(variant, inner)).join('') +
    `${indent}</tu>`
  );
}

export interface SplicedUnit {
  text: string;
  /** Variants with offsets into `text` */
  variants: Segment[];
}

/**
 * A unit from a parsed file: its source text, with only the <seg> contents
 * of edited variants replaced.
 */
export function spliceUnit(unit: TranslationUnit, source: UnitSource): SplicedUnit {
  const edited = new Set(editedVariants(unit));
  if (edited.size === 0) return { text: source.text, variants: unit.variants };
  if (unit.variants.some((variant) => !variant.source)) {
    return {
      text: canonicalUnit(unit, ''),
      variants: unit.variants.map((variant) => ({ ...variant, source: null })),
    };
  }

  const ordered = unit.variants
    .flatMap((variant) => (variant.source ? [{ variant, seg: variant.source }] : []))
    .sort((a, b) => a.seg.start - b.seg.start);
  const moved = new Map<Segment, SegmentSource>();
  let text = '';
  let cursor = 0;
  let delta = 0;

  for (const { variant, seg } of ordered) {
    if (!edited.has(variant)) {
      moved.set(variant, {
        ...seg,
        start: seg.start + delta,
        end: seg.end + delta,
        innerStart: seg.innerStart + delta,
        innerEnd: seg.innerEnd + delta,
      });
      continue;
    }

    const content = serializeRuns(variant.content);
    const openTag = seg.selfClosing
      ? source.text.slice(seg.start, seg.end).replace(/\s*\/>$/, '>')
      : source.text.slice(seg.start, seg.innerStart);
    const closeTag = seg.selfClosing ? '</seg>' : source.text.slice(seg.innerEnd, seg.end);
    const start = text.length + (seg.start - cursor);

    text += source.text.slice(cursor, seg.start) + openTag + content + closeTag;
    cursor = seg.end;
    moved.set(variant, {
      start,
      end: text.length,
      innerStart: start + openTag.length,
      innerEnd: start + openTag.length + content.length,
      selfClosing: false,
    });
    delta = text.length - cursor;
  }
  text += source.text.slice(cursor);

  return {
    text,
    variants: unit.variants.map((variant) => {
      const next = moved.get(variant);
      return next ? { ...variant, source: next } : variant;
    }),
  };
}

/**
 * The unit as it reads once written: edits folded into its source text and
 * dirty state cleared.
 */
export function rebaseUnit(unit: TranslationUnit): TranslationUnit {
  if (!unit.dirty && !unit.originalSnapshot) return unit;
  const clean = { ...unit, dirty: false, originalSnapshot: null };
  if (!unit.source) return clean;
  const { text, variants } = spliceUnit(unit, unit.source);
  return { ...clean, variants, source: { leading: unit.source.leading, text } };
}

function canonicalDocument(doc: TmxDocument): string {
  const header = doc.header.blocks.length === 0
    ? `${INDENT}<header${serializeAttributes(doc.header.attributes)}/>\n`
    : `${INDENT}<header${serializeAttributes(doc.header.attributes)}>\n` +
      blockLines(doc.header.blocks, INDENT + INDENT) +
      `${INDENT}</header>\n`;
  const units = listUnits(doc).map((unit) => `${canonicalUnit(unit, INDENT + INDENT)}\n`).join('');
  const declaration = doc.xmlDeclaration ? `${doc.xmlDeclaration}\n` : '';
  return (
    declaration +
    `<tmx${serializeAttributes(doc.rootAttributes)}>\n` +
    header +
    `${INDENT}<body>\n` +
    units +
    `${INDENT}</body>\n` +
    '</tmx>\n'
  );
}

/** Render a document as TMX text */
export function serializeTmx(doc: TmxDocument): string {
  const { layout } = doc;
  if (!layout) return canonicalDocument(doc);

  const parts = [layout.prolog, layout.header];
  for (const unit of listUnits(doc)) {
    if (unit.source) {
      parts.push(unit.source.leading, spliceUnit(unit, unit.source).text);
    } else {
      parts.push(`\n${canonicalUnit(unit, INDENT + INDENT)}`);
    }
  }
  parts.push(layout.epilog);
  return parts.join('');
}

/** Encode a document in the encoding it was read with */
export function encodeTmx(doc: TmxDocument): Uint8Array {
  const text = serializeTmx(doc);
  const bad = findDisallowedChar(text);
  if (bad >= 0) {
    throw new WriteError('encoding', `Character ${describeChar(text, bad)} cannot be written to XML`);
  }
  try {
    return encodeText(text, doc.sourceEncoding, doc.bom);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new WriteError('encoding', message, err);
  }
}

/**
 * Write a document to disk atomically. On failure the target file is left
 * as it was and a WriteError is thrown.
 */
export async function writeTmx(doc: TmxDocument, targetPath: string, options: AtomicWriteOptions = {}): Promise<void> {
  const bytes = encodeTmx(doc);
  try {
    await writeFileAtomic(targetPath, bytes, options);
  } catch (err) {
    if (err instanceof WriteError) throw err;
    throw new WriteError('io', `Cannot write ${targetPath}`, err);
  }
}
