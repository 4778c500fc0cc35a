import { DEFAULT_RULES, EMAIL_PATTERN } from './constants.js';
import type { ContactCandidate, ContactRules, FieldFailure, ValidationResult } from './types.js';

export function buildPhonePattern(rules: Pick<ContactRules, 'phoneMinDigits' | 'phoneMaxDigits'>): RegExp {
  return new RegExp(`^\\d{${rules.phoneMinDigits},${rules.phoneMaxDigits}}$`);
}

function describeDigits(rules: Pick<ContactRules, 'phoneMinDigits' | 'phoneMaxDigits'>): string {
  return rules.phoneMinDigits === rules.phoneMaxDigits
    ? `exactly ${rules.phoneMinDigits}`
    : `${rules.phoneMinDigits} to ${rules.phoneMaxDigits}`;
}

export function validateContact(
  candidate: ContactCandidate,
  rules: ContactRules = DEFAULT_RULES,
): ValidationResult {
  const name = (candidate.name ?? '').trim();
  const phone = (candidate.phone ?? '').trim();
  const email = (candidate.email ?? '').trim();
  const failures: FieldFailure[] = [];

  if (!name) {
    failures.push({ field: 'name', reason: 'MissingField', message: 'Name cannot be empty.' });
  }

  if (!phone) {
    failures.push({ field: 'phone', reason: 'MissingField', message: 'Phone number cannot be empty.' });
  } else if (!buildPhonePattern(rules).test(phone)) {
    failures.push({
      field: 'phone',
      reason: 'InvalidPhoneFormat',
      message: `Phone number must contain only digits, ${describeDigits(rules)} of them. Got: "${phone}"`,
    });
  }

  if (!email) {
    failures.push({ field: 'email', reason: 'MissingField', message: 'Email cannot be empty.' });
  } else if (!EMAIL_PATTERN.test(email)) {
    failures.push({
      field: 'email',
      reason: 'InvalidEmailFormat',
      message: `Email must look like name@domain.tld. Got: "${email}"`,
    });
  }

  if (failures.length > 0) {
    return { valid: false, failures };
  }
  return { valid: true, contact: { name, phone, email } };
}

export function formatFailures(failures: FieldFailure[]): string {
  return failures.map(f => f.message).join(' ');
}
