import type { ContactBookConfig, ContactRules } from './types.js';

export const VALID_SORT_KEYS = ['name', 'phone', 'email'] as const;

export const DEFAULT_RULES: ContactRules = {
  phoneMinDigits: 5,
  // E.164 numbers have at most 15 digits; raise it in config.json for longer local formats
  phoneMaxDigits: 15,
  rejectDuplicatePhones: false,
};

export const DEFAULT_CONFIG: ContactBookConfig = {
  contactsFile: 'contacts.json',
  ...DEFAULT_RULES,
};

// local@domain.tld, no whitespace, a single @
export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
