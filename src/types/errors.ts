export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export type ParseErrorKind = 'malformed' | 'not-tmx' | 'io' | 'cancelled';

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly position: SourcePosition | null;

  constructor(kind: ParseErrorKind, message: string, options: { cause?: unknown; position?: SourcePosition } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ParseError';
    this.kind = kind;
    this.position = options.position ?? null;
  }
}

export type EditErrorKind = 'language-mismatch' | 'stale-session' | 'write-in-progress' | 'invalid-character';

export class EditError extends Error {
  readonly kind: EditErrorKind;

  constructor(kind: EditErrorKind, message: string) {
    super(message);
    this.name = 'EditError';
    this.kind = kind;
  }
}

export type WriteErrorKind = 'io' | 'encoding' | 'temp-collision';

export class WriteError extends Error {
  readonly kind: WriteErrorKind;

  constructor(kind: WriteErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'WriteError';
    this.kind = kind;
  }
}
