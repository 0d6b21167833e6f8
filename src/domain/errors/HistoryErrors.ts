export class FileError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Unable to read transactions file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'FileError';
  }
}

export interface ParseErrorLocation {
  line?: number;
  column?: string;
}

export class ParseError extends Error {
  readonly line?: number;
  readonly column?: string;

  constructor(message: string, location: ParseErrorLocation = {}) {
    const where = [
      location.line !== undefined ? `line ${location.line}` : undefined,
      location.column !== undefined ? `column "${location.column}"` : undefined,
    ]
      .filter(Boolean)
      .join(', ');

    super(where ? `${message} (${where})` : message);
    this.name = 'ParseError';
    this.line = location.line;
    this.column = location.column;
  }
}
