import type { Attributes, Segment, TextRun } from '../types/tmx';
import { escapeText, serializeAttributes } from './xml';

/** Visible text of a run sequence: every text run, depth first */
export function plainText(runs: readonly TextRun[]): string {
  let out = '';
  for (const run of runs) {
    out += run.kind === 'text' ? run.text : plainText(run.children);
  }
  return out;
}

/** Append text to a run list, merging with a trailing text run */
export function appendText(runs: TextRun[], text: string): void {
  if (text === '') return;
  const last = runs[runs.length - 1];
  if (last?.kind === 'text') {
    runs[runs.length - 1] = { kind: 'text', text: last.text + text };
  } else {
    runs.push({ kind: 'text', text });
  }
}

/** Runs produced by a plain-text edit; inline markup does not survive an edit */
export function fromPlainText(text: string): TextRun[] {
  return text === '' ? [] : [{ kind: 'text', text }];
}

function attributesEqual(a: Attributes, b: Attributes): boolean {
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key, i) => key === bKeys[i] && a[key] === b[key]);
}

export function runsEqual(a: readonly TextRun[], b: readonly TextRun[]): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  return a.every((run, i) => {
    const other = b[i];
    if (run.kind === 'text') return other.kind === 'text' && other.text === run.text;
    return (
      other.kind === 'tag' &&
      other.name === run.name &&
      other.selfClosing === run.selfClosing &&
      attributesEqual(run.attributes, other.attributes) &&
      runsEqual(run.children, other.children)
    );
  });
}

/** Serialize runs as the inner markup of a <seg> */
export function serializeRuns(runs: readonly TextRun[]): string {
  return runs
    .map((run) => {
      if (run.kind === 'text') return escapeText(run.text);
      const attrs = serializeAttributes(run.attributes);
      if (run.selfClosing && run.children.length === 0) return `<${run.name}${attrs}/>`;
      return `<${run.name}${attrs}>${serializeRuns(run.children)}</${run.name}>`;
    })
    .join('');
}

/** Case-insensitive lookup of a variant by language code */
export function findVariant(variants: readonly Segment[], language: string): Segment | undefined {
  const wanted = language.toLowerCase();
  return variants.find((v) => v.language.toLowerCase() === wanted);
}
