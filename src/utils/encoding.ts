import iconv from 'iconv-lite';

export interface DetectedEncoding {
  /** WHATWG encoding name, as reported by TextDecoder */
  encoding: string;
  bom: boolean;
}

/** Bytes needed before the encoding can be decided */
export const SNIFF_LENGTH = 1024;

const DECLARED_ENCODING = /^<\?xml[^>]*?\bencoding\s*=\s*["']([^"']*)["']/;

/**
 * Decide the encoding of an XML byte stream from its first bytes:
 * byte order mark first, then the UTF-16 pattern of "<?", then the
 * declaration's encoding attribute, then UTF-8.
 * Throws RangeError for an encoding label the runtime does not know.
 */
export function detectEncoding(head: Uint8Array): DetectedEncoding {
  if (head[0] === 0xef && head[1] === 0xbb && head[2] === 0xbf) return { encoding: 'utf-8', bom: true };
  if (head[0] === 0xff && head[1] === 0xfe) return { encoding: 'utf-16le', bom: true };
  if (head[0] === 0xfe && head[1] === 0xff) return { encoding: 'utf-16be', bom: true };
  if (head[0] === 0x3c && head[1] === 0x00 && head[2] === 0x3f && head[3] === 0x00) {
    return { encoding: 'utf-16le', bom: false };
  }
  if (head[0] === 0x00 && head[1] === 0x3c && head[2] === 0x00 && head[3] === 0x3f) {
    return { encoding: 'utf-16be', bom: false };
  }

  const ascii = Buffer.from(head.subarray(0, SNIFF_LENGTH)).toString('latin1');
  const label = DECLARED_ENCODING.exec(ascii)?.[1];
  if (label === undefined) return { encoding: 'utf-8', bom: false };
  return { encoding: new TextDecoder(label.trim()).encoding, bom: false };
}

export class UnencodableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnencodableError';
  }
}

function codePointLabel(char: string): string {
  return `U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`;
}

/** iconv-lite substitutes what it cannot encode, so a lossy result is found by decoding it again */
function firstUnencodable(text: string, encoding: string): string | undefined {
  for (const char of text) {
    if (iconv.decode(iconv.encode(char, encoding), encoding) !== char) return char;
  }
  return undefined;
}

/** Encode text back into the encoding it was read from */
export function encodeText(text: string, encoding: string, bom: boolean): Uint8Array {
  if (!iconv.encodingExists(encoding)) throw new UnencodableError(`Writing ${encoding} is not supported`);

  const bytes = iconv.encode(text, encoding, { addBOM: bom });
  if (iconv.decode(bytes, encoding) !== text) {
    const char = firstUnencodable(text, encoding);
    throw new UnencodableError(
      char === undefined
        ? `Text cannot be written as ${encoding}`
        : `Character ${codePointLabel(char)} cannot be written as ${encoding}`
    );
  }
  return bytes;
}
