import { openStore, parseArgs, formatContact, describeError, reportLoad } from './utils.js';
import { findDuplicatePhone } from '../shared/search.js';

const args = parseArgs(process.argv.slice(2));

if (!args['name'] && !args['phone'] && !args['email']) {
  console.error('Usage: npx tsx src/addContact.ts --name "Name" --phone 5551234567 --email name@example.com');
  process.exit(1);
}

try {
  const store = openStore();
  reportLoad(store);

  // Warn on a shared phone number; the store rejects it only when configured to
  const phone = (args['phone'] ?? '').trim();
  const dup = phone ? findDuplicatePhone(store.all(), phone) : -1;
  if (dup >= 0) {
    console.warn(`⚠  Possible duplicate: ${formatContact(store.get(dup), dup)}`);
  }

  const contact = store.add({ name: args['name'], phone: args['phone'], email: args['email'] });
  console.log(`✅ Added contact: ${formatContact(contact, store.size - 1)}`);
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
