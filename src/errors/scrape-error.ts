export type ScrapeErrorKind = 'input' | 'parse' | 'extraction' | 'session';

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;

  constructor(kind: ScrapeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScrapeError';
    this.kind = kind;
  }
}

/** No usable query source. Fatal for the run. */
export class InputError extends ScrapeError {
  constructor(message: string) {
    super('input', message);
    this.name = 'InputError';
  }
}

/** A coordinate or numeric field could not be parsed. Drops one record. */
export class ParseError extends ScrapeError {
  readonly input?: string;

  constructor(message: string, input?: string) {
    super('parse', message);
    this.name = 'ParseError';
    this.input = input;
  }
}

/** Any other failure while processing one listing entry. Drops one record. */
export class ExtractionError extends ScrapeError {
  constructor(message: string, cause?: unknown) {
    super('extraction', message, { cause });
    this.name = 'ExtractionError';
  }
}

/** The browser session failed outside of a single entry (search, scroll, navigation). */
export class SessionError extends ScrapeError {
  constructor(message: string, cause?: unknown) {
    super('session', message, { cause });
    this.name = 'SessionError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function toEntryError(error: unknown): ParseError | ExtractionError {
  if (error instanceof ParseError || error instanceof ExtractionError) {
    return error;
  }
  return new ExtractionError(errorMessage(error), error);
}
