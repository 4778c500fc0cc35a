import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { contactListSchema, describeIssues } from '../shared/schema.js';
import { DEFAULT_RULES } from '../shared/constants.js';
import { validateContact } from '../shared/validation.js';
import { findDuplicatePhone } from '../shared/search.js';
import {
  ValidationError, StorageError, NotFoundError, DuplicateContactError,
} from '../shared/errors.js';
import type { Contact, ContactCandidate, ContactRules, LoadReport } from '../shared/types.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// Only the three persisted keys, in a fixed order.
function toStored(c: Contact): Contact {
  return { name: c.name, phone: c.phone, email: c.email };
}

/**
 * File-backed contact list. Every mutation writes the whole list before the
 * in-memory copy is replaced, so a failed write leaves the store as it was.
 */
export class ContactStore {
  private contacts: Contact[] = [];
  private report: LoadReport = { status: 'missing', count: 0, message: 'Contacts not loaded yet.' };

  constructor(
    readonly filePath: string,
    private readonly rules: ContactRules = DEFAULT_RULES,
  ) {}

  get size(): number {
    return this.contacts.length;
  }

  get lastLoad(): LoadReport {
    return { ...this.report };
  }

  load(): Contact[] {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      this.contacts = [];
      this.report = isMissingFile(err)
        ? { status: 'missing', count: 0, message: `Contact file not found at ${this.filePath}. Starting with an empty contact book.` }
        : { status: 'unreadable', count: 0, message: `${new StorageError(this.filePath, 'read', err).message}. Starting with an empty contact book.` };
      return this.all();
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.contacts = [];
      this.report = { status: 'unreadable', count: 0, message: `Could not decode JSON from ${this.filePath} (${detail}). Starting with an empty contact book.` };
      return this.all();
    }

    const parsed = contactListSchema.safeParse(data);
    if (!parsed.success) {
      this.contacts = [];
      this.report = { status: 'unreadable', count: 0, message: `Unexpected contents in ${this.filePath} (${describeIssues(parsed.error)}). Starting with an empty contact book.` };
      return this.all();
    }

    this.contacts = parsed.data;
    this.report = { status: 'loaded', count: parsed.data.length, message: `Loaded ${parsed.data.length} contact(s) from ${this.filePath}.` };
    return this.all();
  }

  /**
   * Replace the whole list. Every record is validated (and, when duplicates
   * are rejected, checked against the records before it) before anything
   * is written.
   */
  save(contacts: readonly Contact[]): void {
    const next: Contact[] = [];
    contacts.forEach((candidate, position) => {
      const result = validateContact(candidate, this.rules);
      if (!result.valid) {
        throw new ValidationError(result.failures, position);
      }
      if (this.rules.rejectDuplicatePhones) {
        const dup = findDuplicatePhone(next, result.contact.phone);
        if (dup >= 0) {
          throw new DuplicateContactError(dup, next[dup]);
        }
      }
      next.push(result.contact);
    });
    this.write(next);
  }

  private write(contacts: readonly Contact[]): void {
    const next = contacts.map(toStored);
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(next, null, 2) + '\n', 'utf-8');
    } catch (err) {
      throw new StorageError(this.filePath, 'write', err);
    }
    this.contacts = next;
  }

  all(): Contact[] {
    return this.contacts.map(toStored);
  }

  get(index: number): Contact {
    this.assertIndex(index);
    return toStored(this.contacts[index]);
  }

  indexOfPhone(phone: string): number {
    return this.contacts.findIndex(c => c.phone === phone.trim());
  }

  add(candidate: ContactCandidate): Contact {
    const contact = this.accept(candidate);
    this.write([...this.contacts, contact]);
    return toStored(contact);
  }

  update(index: number, candidate: ContactCandidate): Contact {
    this.assertIndex(index);
    const contact = this.accept(candidate, index);
    const next = [...this.contacts];
    next[index] = contact;
    this.write(next);
    return toStored(contact);
  }

  delete(index: number): Contact {
    this.assertIndex(index);
    const removed = this.contacts[index];
    this.write(this.contacts.filter((_, i) => i !== index));
    return toStored(removed);
  }

  clear(): void {
    this.write([]);
  }

  private accept(candidate: ContactCandidate, replacing?: number): Contact {
    const result = validateContact(candidate, this.rules);
    if (!result.valid) {
      throw new ValidationError(result.failures);
    }

    if (this.rules.rejectDuplicatePhones) {
      const dup = findDuplicatePhone(this.contacts, result.contact.phone, replacing);
      if (dup >= 0) {
        throw new DuplicateContactError(dup, this.contacts[dup]);
      }
    }
    return result.contact;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.contacts.length) {
      throw new NotFoundError(index, this.contacts.length);
    }
  }
}
