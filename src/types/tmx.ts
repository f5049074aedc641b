/** Opaque handle of a translation unit, unique across documents */
export type UnitId = string;

/** Attribute names mapped to values, in source order */
export type Attributes = Record<string, string>;

export interface PlainRun {
  kind: 'text';
  text: string;
}

/** Inline markup element inside a segment (bpt, ept, ph, it, sub, hi or an unknown extension) */
export interface InlineTagRun {
  kind: 'tag';
  name: string;
  attributes: Attributes;
  children: TextRun[];
  selfClosing: boolean;
}

export type TextRun = PlainRun | InlineTagRun;

/** An element kept verbatim (note, prop or anything unrecognised) */
export interface RawBlock {
  name: string;
  attributes: Attributes;
  /** Character content, used for display only */
  text: string;
  /** Exact source slice, reproduced on write */
  xml: string;
}

/** Offsets of a <seg> element, relative to the start of its unit's source text */
export interface SegmentSource {
  start: number;
  end: number;
  innerStart: number;
  innerEnd: number;
  selfClosing: boolean;
}

export interface Segment {
  language: string;
  attributes: Attributes;
  blocks: RawBlock[];
  content: TextRun[];
  source: SegmentSource | null;
}

export interface UnitSource {
  /** Text between the previous boundary and the opening <tu */
  leading: string;
  /** The <tu> element exactly as read */
  text: string;
}

export interface TranslationUnit {
  id: UnitId;
  attributes: Attributes;
  blocks: RawBlock[];
  variants: Segment[];
  dirty: boolean;
  /** Variants as they were before the first edit since the last save */
  originalSnapshot: Segment[] | null;
  source: UnitSource | null;
}

export interface Header {
  attributes: Attributes;
  blocks: RawBlock[];
}

/** Source text around the units, kept for verbatim output */
export interface DocumentLayout {
  prolog: string;
  header: string;
  epilog: string;
}

export interface TmxDocument {
  id: string;
  header: Header;
  rootAttributes: Attributes;
  order: readonly UnitId[];
  units: ReadonlyMap<UnitId, TranslationUnit>;
  sourceEncoding: string;
  bom: boolean;
  xmlDeclaration: string;
  layout: DocumentLayout | null;
  dirty: boolean;
  filePath: string | null;
}

export interface ParseProgress {
  unitsParsed: number;
  bytesConsumed: number;
  totalBytes: number | null;
  estimatedTotalUnits: number | null;
}

export type ProgressSink = (progress: ParseProgress) => void;
