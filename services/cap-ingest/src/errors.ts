export class VerificationError extends Error {
  readonly expected: number;
  readonly actual: number;
  readonly context: string;

  constructor(context: string, expected: number, actual: number) {
    super(`Expected cap_hit sum for ${context} to be ${expected}, but got ${actual}`);
    this.name = 'VerificationError';
    this.expected = expected;
    this.actual = actual;
    this.context = context;
  }
}

/** The page lacks a node the pipeline cannot do without (active table, a footer total). */
export class PageStructureError extends Error {
  readonly context: string;

  constructor(context: string, detail: string) {
    super(`${context}: ${detail}`);
    this.name = 'PageStructureError';
    this.context = context;
  }
}

export class DirectoryError extends Error {
  readonly found: number;

  constructor(found: number, expected: number) {
    super(`Extracted ${found} instead of ${expected} NFL teams`);
    this.name = 'DirectoryError';
    this.found = found;
  }
}

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, options?: { cause?: unknown }) {
    const reason =
      status !== null
        ? `status ${status}`
        : options?.cause instanceof Error
        ? options.cause.message
        : 'network failure';
    super(`Request to ${url} failed (${reason})`, options);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class StoreError extends Error {
  constructor(operation: string, message: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'StoreError';
  }
}

export type TeamFailureKind = 'verification' | 'structure' | 'fetch' | 'store' | 'unknown';

export function classifyTeamError(error: unknown): TeamFailureKind {
  if (error instanceof VerificationError) return 'verification';
  if (error instanceof PageStructureError) return 'structure';
  if (error instanceof FetchError) return 'fetch';
  if (error instanceof StoreError) return 'store';
  return 'unknown';
}
