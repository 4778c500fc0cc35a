import { formatFailures } from './validation.js';
import type { Contact, FieldFailure, ValidationFailureReason } from './types.js';

export type ErrorCode = 'VALIDATION' | 'STORAGE' | 'NOT_FOUND' | 'DUPLICATE' | 'CONFIG';

export class ContactBookError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ContactBookError {
  constructor(readonly failures: FieldFailure[], readonly position?: number) {
    super(
      'VALIDATION',
      position === undefined
        ? formatFailures(failures)
        : `Contact at position ${position} is invalid: ${formatFailures(failures)}`,
    );
  }

  /** Reason of the first failing field. */
  get reason(): ValidationFailureReason {
    return this.failures[0]?.reason ?? 'MissingField';
  }
}

export class StorageError extends ContactBookError {
  constructor(readonly path: string, action: 'read' | 'write', cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE', `Could not ${action} contacts file ${path}: ${detail}`, { cause });
  }
}

export class NotFoundError extends ContactBookError {
  constructor(readonly index: number, size: number) {
    super(
      'NOT_FOUND',
      size === 0
        ? `No contact at position ${index}: the contact book is empty.`
        : `No contact at position ${index}. Valid positions are 0 to ${size - 1}.`,
    );
  }
}

export class DuplicateContactError extends ContactBookError {
  constructor(readonly existingIndex: number, readonly existing: Contact) {
    super(
      'DUPLICATE',
      `A contact with phone number ${existing.phone} already exists: ${existing.name} (position ${existingIndex}).`,
    );
  }
}

export class ConfigError extends ContactBookError {
  constructor(readonly path: string, detail: string, cause?: unknown) {
    super('CONFIG', `Invalid config file ${path}: ${detail}`, { cause });
  }
}
