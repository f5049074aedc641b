import type { Attributes } from '../types/tmx';

/** Escape XML special characters for use inside an attribute value */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
    .replace(/\r/g, '&#13;')
    .replace(/\n/g, '&#10;')
    .replace(/\t/g, '&#9;');
}

/** Escape character data; quotes are legal in text and stay as they are */
export function escapeText(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#13;');
}

/** Control characters, noncharacters and unpaired surrogates; none can appear in XML 1.0 */
const DISALLOWED = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Index of the first character XML cannot carry, or -1 */
export function findDisallowedChar(str: string): number {
  return str.search(DISALLOWED);
}

/** `U+0007` style label for the code unit at `index` */
export function describeChar(str: string, index: number): string {
  return `U+${str.charCodeAt(index).toString(16).toUpperCase().padStart(4, '0')}`;
}

/** Render attributes as ` name="value"` pairs in their stored order */
export function serializeAttributes(attributes: Attributes): string {
  return Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
    .join('');
}
