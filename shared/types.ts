import type { VALID_SORT_KEYS } from './constants.js';

export interface Contact {
  name: string;
  phone: string;
  email: string;
}

export type ContactField = keyof Contact;

/** A record as it arrives from a form or tool call, before validation. */
export type ContactCandidate = Partial<Record<ContactField, string | null>>;

export type ValidationFailureReason = 'MissingField' | 'InvalidPhoneFormat' | 'InvalidEmailFormat';

export interface FieldFailure {
  field: ContactField;
  reason: ValidationFailureReason;
  message: string;
}

export type ValidationResult =
  | { valid: true; contact: Contact }
  | { valid: false; failures: FieldFailure[] };

export interface ContactRules {
  phoneMinDigits: number;
  phoneMaxDigits: number;
  rejectDuplicatePhones: boolean;
}

export interface ContactBookConfig extends ContactRules {
  contactsFile: string;
}

export type SortKey = typeof VALID_SORT_KEYS[number];

export type LoadStatus = 'loaded' | 'missing' | 'unreadable';

export interface LoadReport {
  status: LoadStatus;
  count: number;
  message: string;
}
