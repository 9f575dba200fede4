import type { ZodIssue } from 'zod';

export class HarvestError extends Error {
  readonly url?: string;

  constructor(message: string, options?: { url?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.url = options?.url;
  }
}

/** The entry point (or its index resource) could not be reached at all. */
export class DiscoveryError extends HarvestError {}

export class FetchError extends HarvestError {
  readonly status?: number;

  constructor(message: string, options?: { url?: string; status?: number; cause?: unknown }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class ParseError extends HarvestError {}

export class ValidationError extends HarvestError {
  readonly issues: ZodIssue[];

  constructor(message: string, options?: { url?: string; issues?: ZodIssue[] }) {
    super(message, options);
    this.issues = options?.issues ?? [];
  }
}

export class PersistenceError extends HarvestError {
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options);
    this.path = options?.path;
  }
}

export class HarvestInterruptedError extends HarvestError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
