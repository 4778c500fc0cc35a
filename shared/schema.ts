import { z } from 'zod';
import { DEFAULT_CONFIG, VALID_SORT_KEYS } from './constants.js';

/**
 * Shape of one record in the contacts file. Older files may carry
 * `email: null`; it loads as an empty string. Extra keys are dropped.
 */
export const storedContactSchema = z.object({
  name: z.string(),
  phone: z.string(),
  email: z.string().nullish().transform(v => v ?? ''),
});

export const contactListSchema = z.array(storedContactSchema);

export const configSchema = z.object({
  contactsFile: z.string().min(1).default(DEFAULT_CONFIG.contactsFile),
  phoneMinDigits: z.number().int().min(1).default(DEFAULT_CONFIG.phoneMinDigits),
  phoneMaxDigits: z.number().int().min(1).default(DEFAULT_CONFIG.phoneMaxDigits),
  rejectDuplicatePhones: z.boolean().default(DEFAULT_CONFIG.rejectDuplicatePhones),
}).refine(c => c.phoneMinDigits <= c.phoneMaxDigits, {
  message: 'phoneMinDigits must not exceed phoneMaxDigits',
  path: ['phoneMaxDigits'],
});

export const sortKeySchema = z.enum(VALID_SORT_KEYS);

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
