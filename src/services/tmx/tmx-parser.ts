import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { TextDecoder } from 'node:util';
import { SaxesParser } from 'saxes';
import type {
  Attributes,
  Header,
  InlineTagRun,
  ParseProgress,
  ProgressSink,
  RawBlock,
  Segment,
  TextRun,
  TmxDocument,
  TranslationUnit,
  UnitId,
} from '../../types/tmx';
import { ParseError } from '../../types/errors';
import { DEFAULT_READ_CHUNK_SIZE } from '../../constants/defaults';
import { detectEncoding, SNIFF_LENGTH } from '../../utils/encoding';
import { appendText } from '../../utils/text-runs';
import { generateId } from '../../utils/id-generator';

export interface ParseOptions {
  /** Cancels the parse; checked at unit boundaries */
  signal?: AbortSignal;
  onProgress?: ProgressSink;
  /** Size of the whole input, used to estimate the unit count */
  totalBytes?: number;
  /** Largest piece of text handed to the XML parser before yielding */
  chunkSize?: number;
  filePath?: string;
}

type Frame =
  | { kind: 'root' }
  | { kind: 'header'; start: number; attributes: Attributes; blocks: RawBlock[] }
  | { kind: 'body' }
  | { kind: 'unit'; start: number; attributes: Attributes; blocks: RawBlock[]; variants: Segment[]; languages: Set<string> }
  | { kind: 'variant'; start: number; attributes: Attributes; blocks: RawBlock[]; seg: SegCapture | null }
  | { kind: 'seg'; capture: SegCapture }
  | { kind: 'inline'; run: InlineTagRun }
  | { kind: 'raw'; start: number; name: string; attributes: Attributes; text: string; into: RawBlock[] }
  | { kind: 'skip' };

interface SegCapture {
  start: number;
  end: number;
  innerStart: number;
  innerEnd: number;
  selfClosing: boolean;
  runs: TextRun[];
}

function readAttributes(tag: { attributes: Record<string, string | { value: string }> }): Attributes {
  const out: Attributes = {};
  for (const [name, value] of Object.entries(tag.attributes)) {
    out[name] = typeof value === 'string' ? value : value.value;
  }
  return out;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new ParseError('cancelled', 'Parsing was cancelled');
}

/** Decoded text from the last kept boundary up to what has been fed */
class SourceWindow {
  private text = '';
  private start = 0;

  append(piece: string): void {
    this.text += piece;
  }

  get end(): number {
    return this.start + this.text.length;
  }

  slice(from: number, to: number): string {
    return this.text.slice(from - this.start, to - this.start);
  }

  /** Offset of the last '<' before `offset` */
  tagStartBefore(offset: number): number {
    const i = this.text.lastIndexOf('<', offset - 1 - this.start);
    return i < 0 ? offset : i + this.start;
  }

  dropBefore(offset: number): void {
    this.text = this.text.slice(offset - this.start);
    this.start = offset;
  }
}

/** Builds a TmxDocument from SAX events while keeping the source slices */
class TmxBuilder {
  private readonly parser = new SaxesParser({ position: true });
  private readonly window = new SourceWindow();
  private readonly stack: Frame[] = [];
  private readonly units = new Map<UnitId, TranslationUnit>();
  private readonly order: UnitId[] = [];

  private anchor = 0;
  private tagStart = 0;
  private sawRoot = false;
  private rootAttributes: Attributes = {};
  private header: Header = { attributes: {}, blocks: [] };
  private prolog = '';
  private headerText = '';
  private sawHeader = false;
  private xmlDeclaration = '';
  private sinkFailed = false;

  bytesConsumed = 0;

  constructor(private readonly options: ParseOptions) {
    this.parser.on('xmldecl', () => {
      this.xmlDeclaration = this.window.slice(0, this.parser.position);
    });
    this.parser.on('opentagstart', () => {
      this.tagStart = this.window.tagStartBefore(this.parser.position);
    });
    this.parser.on('opentag', (tag) => this.openTag(tag.name, readAttributes(tag), tag.isSelfClosing));
    this.parser.on('closetag', () => this.closeTag());
    this.parser.on('text', (text) => this.addText(text));
    this.parser.on('cdata', (text) => this.addText(text));
  }

  /** Hand decoded text to the XML parser, yielding to the event loop after every piece */
  async feed(text: string): Promise<void> {
    const size = this.options.chunkSize ?? DEFAULT_READ_CHUNK_SIZE;
    for (let i = 0; i < text.length; i += size) {
      const piece = text.slice(i, i + size);
      this.window.append(piece);
      this.run(() => this.parser.write(piece));
      await yieldToEventLoop();
      throwIfCancelled(this.options.signal);
    }
  }

  finish(sourceEncoding: string, bom: boolean): TmxDocument {
    this.run(() => this.parser.close());
    if (!this.sawRoot) {
      throw new ParseError('malformed', 'Document has no root element', { position: this.position() });
    }
    return {
      id: generateId('doc'),
      header: this.header,
      rootAttributes: this.rootAttributes,
      order: this.order,
      units: this.units,
      sourceEncoding,
      bom,
      xmlDeclaration: this.xmlDeclaration,
      layout: {
        prolog: this.prolog,
        header: this.headerText,
        epilog: this.window.slice(this.anchor, this.window.end),
      },
      dirty: false,
      filePath: this.options.filePath ?? null,
    };
  }

  position(): { line: number; column: number; offset: number } {
    return { line: this.parser.line, column: this.parser.column, offset: this.parser.position };
  }

  /** Run a parser call, turning its errors into MalformedDocument */
  private run(step: () => void): void {
    try {
      step();
    } catch (err) {
      if (err instanceof ParseError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError('malformed', `Malformed XML: ${message}`, { cause: err, position: this.position() });
    }
  }

  private top(): Frame | undefined {
    return this.stack[this.stack.length - 1];
  }

  private openTag(name: string, attributes: Attributes, selfClosing: boolean): void {
    const parent = this.top();
    const start = this.tagStart;
    const openEnd = this.parser.position;

    if (!parent) {
      if (name !== 'tmx') throw new ParseError('not-tmx', `Root element is <${name}>, expected <tmx>`);
      this.sawRoot = true;
      this.rootAttributes = attributes;
      this.stack.push({ kind: 'root' });
      return;
    }

    switch (parent.kind) {
      case 'root':
        if (name === 'header' && !this.sawHeader && this.order.length === 0) {
          this.stack.push({ kind: 'header', start, attributes, blocks: [] });
        } else if (name === 'body') {
          this.stack.push({ kind: 'body' });
        } else {
          this.stack.push({ kind: 'skip' });
        }
        return;
      case 'header':
        this.pushRaw(start, name, attributes, parent.blocks);
        return;
      case 'body':
        if (name === 'tu') {
          this.stack.push({ kind: 'unit', start, attributes, blocks: [], variants: [], languages: new Set() });
        } else {
          this.stack.push({ kind: 'skip' });
        }
        return;
      case 'unit':
        if (name === 'tuv') {
          this.stack.push({ kind: 'variant', start, attributes, blocks: [], seg: null });
        } else {
          this.pushRaw(start, name, attributes, parent.blocks);
        }
        return;
      case 'variant':
        if (name === 'seg' && !parent.seg) {
          const capture: SegCapture = { start, end: openEnd, innerStart: openEnd, innerEnd: openEnd, selfClosing, runs: [] };
          parent.seg = capture;
          this.stack.push({ kind: 'seg', capture });
        } else {
          this.pushRaw(start, name, attributes, parent.blocks);
        }
        return;
      case 'seg':
      case 'inline': {
        const run: InlineTagRun = { kind: 'tag', name, attributes, children: [], selfClosing };
        const siblings = parent.kind === 'seg' ? parent.capture.runs : parent.run.children;
        siblings.push(run);
        this.stack.push({ kind: 'inline', run });
        return;
      }
      case 'raw':
      case 'skip':
        this.stack.push({ kind: 'skip' });
        return;
    }
  }

  private pushRaw(start: number, name: string, attributes: Attributes, into: RawBlock[]): void {
    this.stack.push({ kind: 'raw', start, name, attributes, text: '', into });
  }

  private closeTag(): void {
    const frame = this.stack.pop();
    const end = this.parser.position;
    if (!frame) return;

    switch (frame.kind) {
      case 'raw':
        frame.into.push({ name: frame.name, attributes: frame.attributes, text: frame.text, xml: this.window.slice(frame.start, end) });
        return;
      case 'seg': {
        const { capture } = frame;
        capture.end = end;
        capture.innerEnd = capture.selfClosing ? end : this.window.tagStartBefore(end);
        if (capture.selfClosing) capture.innerStart = end;
        return;
      }
      case 'variant':
        this.closeVariant(frame, end);
        return;
      case 'unit':
        this.closeUnit(frame, end);
        return;
      case 'header':
        this.sawHeader = true;
        this.header = { attributes: frame.attributes, blocks: frame.blocks };
        this.prolog = this.window.slice(this.anchor, frame.start);
        this.headerText = this.window.slice(frame.start, end);
        this.anchor = end;
        this.window.dropBefore(end);
        return;
      default:
        return;
    }
  }

  private closeVariant(frame: Extract<Frame, { kind: 'variant' }>, end: number): void {
    const unit = this.top();
    if (unit?.kind !== 'unit') return;

    const language = frame.attributes['xml:lang'] ?? frame.attributes.lang ?? '';
    const key = language.toLowerCase();
    if (!frame.seg || unit.languages.has(key)) {
      // No segment, or a second variant for the same language: keep it opaque
      unit.blocks.push({ name: 'tuv', attributes: frame.attributes, text: '', xml: this.window.slice(frame.start, end) });
      return;
    }

    const { seg } = frame;
    unit.languages.add(key);
    unit.variants.push({
      language,
      attributes: frame.attributes,
      blocks: frame.blocks,
      content: seg.runs,
      source: {
        start: seg.start - unit.start,
        end: seg.end - unit.start,
        innerStart: seg.innerStart - unit.start,
        innerEnd: seg.innerEnd - unit.start,
        selfClosing: seg.selfClosing,
      },
    });
  }

  private closeUnit(frame: Extract<Frame, { kind: 'unit' }>, end: number): void {
    const unit: TranslationUnit = {
      id: generateId('tu'),
      attributes: frame.attributes,
      blocks: frame.blocks,
      variants: frame.variants,
      dirty: false,
      originalSnapshot: null,
      source: {
        leading: this.window.slice(this.anchor, frame.start),
        text: this.window.slice(frame.start, end),
      },
    };
    this.units.set(unit.id, unit);
    this.order.push(unit.id);
    this.anchor = end;
    this.window.dropBefore(end);

    this.report();
    throwIfCancelled(this.options.signal);
  }

  private addText(text: string): void {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const frame = this.stack[i];
      switch (frame.kind) {
        case 'seg':
          appendText(frame.capture.runs, text);
          return;
        case 'inline':
          appendText(frame.run.children, text);
          return;
        case 'raw':
          frame.text += text;
          return;
        case 'skip':
          continue;
        default:
          return;
      }
    }
  }

  private report(): void {
    const sink = this.options.onProgress;
    if (!sink) return;
    const totalBytes = this.options.totalBytes ?? null;
    const unitsParsed = this.order.length;
    const progress: ParseProgress = {
      unitsParsed,
      bytesConsumed: this.bytesConsumed,
      totalBytes,
      estimatedTotalUnits:
        totalBytes !== null && this.bytesConsumed > 0
          ? Math.max(unitsParsed, Math.round((unitsParsed * totalBytes) / this.bytesConsumed))
          : null,
    };
    try {
      sink(progress);
    } catch (err) {
      if (!this.sinkFailed) {
        this.sinkFailed = true;
        console.warn('[tmx] Progress callback failed; parsing continues', err);
      }
    }
  }
}

function concatBytes(chunks: Uint8Array[]): Uint8Array {
  return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
}

/**
 * Parse TMX from a stream of byte chunks. Resolves with a complete
 * document or rejects with a ParseError; nothing partial is exposed.
 */
export async function parseTmx(
  input: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  options: ParseOptions = {}
): Promise<TmxDocument> {
  throwIfCancelled(options.signal);
  const builder = new TmxBuilder(options);

  let decoder: TextDecoder | null = null;
  let detected = { encoding: 'utf-8', bom: false };
  const head: Uint8Array[] = [];
  let headLength = 0;

  const openDecoder = (bytes: Uint8Array): TextDecoder => {
    try {
      detected = detectEncoding(bytes);
      return new TextDecoder(detected.encoding, { fatal: true });
    } catch (err) {
      throw new ParseError('malformed', 'Unsupported encoding declaration', {
        cause: err,
        position: { line: 1, column: 0, offset: 0 },
      });
    }
  };

  const decode = (bytes: Uint8Array, active: TextDecoder, stream: boolean): string => {
    try {
      return active.decode(bytes, { stream });
    } catch (err) {
      throw new ParseError('malformed', `Invalid byte sequence for ${active.encoding}`, {
        cause: err,
        position: builder.position(),
      });
    }
  };

  for await (const chunk of input) {
    throwIfCancelled(options.signal);
    builder.bytesConsumed += chunk.byteLength;
    if (!decoder) {
      head.push(chunk);
      headLength += chunk.byteLength;
      if (headLength < SNIFF_LENGTH) continue;
      const bytes = concatBytes(head);
      decoder = openDecoder(bytes);
      await builder.feed(decode(bytes, decoder, true));
      continue;
    }
    await builder.feed(decode(chunk, decoder, true));
  }

  if (!decoder) {
    const bytes = head.length > 0 ? concatBytes(head) : new Uint8Array(0);
    decoder = openDecoder(bytes);
    await builder.feed(decode(bytes, decoder, true));
  }
  await builder.feed(decode(new Uint8Array(0), decoder, false));

  const doc = builder.finish(detected.encoding, detected.bom);
  throwIfCancelled(options.signal);
  return doc;
}

async function* readFileChunks(filePath: string, chunkSize: number): AsyncGenerator<Uint8Array> {
  const stream = createReadStream(filePath, { highWaterMark: chunkSize });
  try {
    for await (const chunk of stream) {
      const bytes: Buffer = chunk;
      yield bytes;
    }
  } catch (err) {
    throw new ParseError('io', `Cannot read ${filePath}`, { cause: err });
  } finally {
    stream.destroy();
  }
}

/** Parse a TMX file from disk, streaming it in chunks */
export async function parseTmxFile(filePath: string, options: ParseOptions = {}): Promise<TmxDocument> {
  throwIfCancelled(options.signal);
  let totalBytes: number;
  try {
    totalBytes = (await stat(filePath)).size;
  } catch (err) {
    throw new ParseError('io', `Cannot open ${filePath}`, { cause: err });
  }
  const chunkSize = options.chunkSize ?? DEFAULT_READ_CHUNK_SIZE;
  return parseTmx(readFileChunks(filePath, chunkSize), { ...options, totalBytes, filePath });
}
