export type HarvestErrorKind =
  | "authentication"
  | "discovery_empty"
  | "extraction"
  | "persistence"
  | "export"
  | "session_closed"
  | "browser_launch";

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal to a batch; the caller may retry later. */
export class AuthenticationError extends HarvestError {
  readonly kind = "authentication";
}

export class DiscoveryEmptyError extends HarvestError {
  readonly kind = "discovery_empty";

  constructor(readonly query: string) {
    super(`No candidates found for "${query}"`);
  }
}

export class ExtractionError extends HarvestError {
  readonly kind = "extraction";

  constructor(
    readonly address: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Extraction failed for ${address} after ${attempts} attempt(s): ${errorMessage(options?.cause)}`, options);
  }
}

export class PersistenceError extends HarvestError {
  readonly kind = "persistence";
}

export class ExportError extends HarvestError {
  readonly kind = "export";
}

export class BrowserLaunchError extends HarvestError {
  readonly kind = "browser_launch";
}

/** The browser, context or page is gone; every later navigation would fail too. */
export class SessionClosedError extends HarvestError {
  readonly kind = "session_closed";
}

export function errorMessage(error: unknown): string {
  if (error === undefined) {
    return "unknown error";
  }
  return error instanceof Error ? error.message : String(error);
}
