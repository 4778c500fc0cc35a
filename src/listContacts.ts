import {
  openStore, parseArgs, parseSortKey, formatContact, describeError, reportLoad, withPositions,
} from './utils.js';
import { sortContacts } from '../shared/search.js';

const args = parseArgs(process.argv.slice(2));
const sortKey = parseSortKey(args['sort']);

if (args['sort'] !== undefined && !sortKey) {
  console.error(`❌ Invalid sort key "${args['sort']}". Must be: name, phone, or email`);
  process.exit(1);
}

try {
  const store = openStore();
  reportLoad(store);

  const contacts = store.all();
  if (contacts.length === 0) {
    console.log('No contacts to display.');
    process.exit(0);
  }

  // Stored positions are what --index takes, whatever the display order
  const rows = withPositions(contacts, sortKey ? sortContacts(contacts, sortKey) : contacts);

  console.log(`📇 ${contacts.length} contact(s)${sortKey ? `, sorted by ${sortKey}` : ''}:\n`);
  for (const row of rows) {
    console.log(`  ${formatContact(row.contact, row.index)}`);
  }
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
