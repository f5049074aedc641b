import type { TmxDocument } from '../types/tmx';
import { parseTmx, type ParseOptions } from '../services/tmx/tmx-parser';

/** Three en/fr units; the second carries paired inline codes and a note */
export const SAMPLE_TMX = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<tmx version="1.4">',
  '  <header creationtool="test" srclang="en" datatype="plaintext" segtype="sentence" adminlang="en" o-tmf="none">',
  '    <note>Header note</note>',
  '    <prop type="x-domain">legal</prop>',
  '  </header>',
  '  <body>',
  '    <tu tuid="1">',
  '      <tuv xml:lang="en"><seg>Hello</seg></tuv>',
  '      <tuv xml:lang="fr"><seg>Bonjour</seg></tuv>',
  '    </tu>',
  '    <tu tuid="2">',
  '      <note>Check this</note>',
  '      <tuv xml:lang="en"><seg>Click <bpt i="1">&lt;b&gt;</bpt>here<ept i="1">&lt;/b&gt;</ept></seg></tuv>',
  '      <tuv xml:lang="fr"><seg>Cliquez <bpt i="1">&lt;b&gt;</bpt>ici<ept i="1">&lt;/b&gt;</ept></seg></tuv>',
  '    </tu>',
  '    <tu tuid="3">',
  '      <tuv xml:lang="en"><seg>Goodbye</seg></tuv>',
  '      <tuv xml:lang="fr"><seg>Au revoir</seg></tuv>',
  '    </tu>',
  '  </body>',
  '</tmx>',
  '',
].join('\n');

/** Wrap unit markup in a minimal document */
export function tmxWith(body: string, header = '<header srclang="en"/>'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<tmx version="1.4">\n${header}\n<body>\n${body}\n</body>\n</tmx>\n`;
}

export function parseString(xml: string, options: ParseOptions = {}): Promise<TmxDocument> {
  return parseTmx([Buffer.from(xml, 'utf8')], options);
}

/** Split bytes into fixed-size chunks */
export function chunked(bytes: Uint8Array, size: number): Uint8Array[] {
  const out: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) out.push(bytes.subarray(i, i + size));
  return out;
}

export function unitAt(doc: TmxDocument, index: number) {
  const unit = doc.units.get(doc.order[index]);
  if (!unit) throw new Error(`No unit at ${index}`);
  return unit;
}
