import type { Contact, SortKey } from './types.js';

export function searchContacts(contacts: readonly Contact[], text: string): Contact[] {
  const q = text.toLowerCase();
  return contacts.filter(c =>
    c.name.toLowerCase().includes(q) ||
    c.phone.toLowerCase().includes(q) ||
    c.email.toLowerCase().includes(q)
  );
}

function compareText(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

// Digits only, leading zeros dropped: a longer number is the larger one.
function numericKey(phone: string): string {
  return phone.replace(/\D/g, '').replace(/^0+/, '');
}

export function comparePhones(a: string, b: string): number {
  const x = numericKey(a);
  const y = numericKey(b);
  if (x.length !== y.length) return x.length - y.length;
  return x < y ? -1 : x > y ? 1 : 0;
}

// Array.prototype.sort is stable, so ties keep their input order.
export function sortByName(contacts: readonly Contact[]): Contact[] {
  return [...contacts].sort((a, b) => compareText(a.name, b.name));
}

export function sortByPhone(contacts: readonly Contact[]): Contact[] {
  return [...contacts].sort((a, b) => comparePhones(a.phone, b.phone));
}

export function sortByEmail(contacts: readonly Contact[]): Contact[] {
  return [...contacts].sort((a, b) => compareText(a.email, b.email));
}

export function sortContacts(contacts: readonly Contact[], key: SortKey): Contact[] {
  switch (key) {
    case 'name': return sortByName(contacts);
    case 'phone': return sortByPhone(contacts);
    case 'email': return sortByEmail(contacts);
  }
}

export function findDuplicatePhone(contacts: readonly Contact[], phone: string, excludeIndex?: number): number {
  return contacts.findIndex((c, idx) => idx !== excludeIndex && c.phone === phone);
}
