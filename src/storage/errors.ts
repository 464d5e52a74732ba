import type { SessionStatus } from './types';

export class ListingStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ListingValidationError extends ListingStoreError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ListingNotFoundError extends ListingStoreError {
  readonly listingId: string;

  constructor(listingId: string) {
    super(`Listing ${listingId} does not exist`);
    this.listingId = listingId;
  }
}

export class InvalidSessionStateError extends ListingStoreError {
  readonly sessionId: string;
  /** Null when no session with this id exists. */
  readonly currentStatus: SessionStatus | null;

  constructor(sessionId: string, currentStatus: SessionStatus | null) {
    super(
      currentStatus === null
        ? `Parsing session ${sessionId} does not exist`
        : `Parsing session ${sessionId} is ${currentStatus}, expected running`
    );
    this.sessionId = sessionId;
    this.currentStatus = currentStatus;
  }
}

export class StorageError extends ListingStoreError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.operation = operation;
  }
}
