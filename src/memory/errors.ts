export type MemoryErrorCode = 'duplicate_id' | 'invalid_entry' | 'unauthorized';

export class MemoryError extends Error {
  constructor(
    readonly code: MemoryErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'MemoryError';
  }
}

// Caller error: an insert reused an id that must be unique. Never retried.
export class DuplicateIdError extends MemoryError {
  constructor(
    readonly kind: string,
    readonly id: string
  ) {
    super('duplicate_id', `${kind} '${id}' already exists and cannot be modified`);
    this.name = 'DuplicateIdError';
  }
}

export class InvalidEntryError extends MemoryError {
  constructor(
    readonly field: string,
    message: string
  ) {
    super('invalid_entry', message);
    this.name = 'InvalidEntryError';
  }
}

export class MutationAuthorityError extends MemoryError {
  constructor(message: string) {
    super('unauthorized', message);
    this.name = 'MutationAuthorityError';
  }
}
