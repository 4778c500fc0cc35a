import {
  openStore, parseArgs, parseSortKey, formatContact, describeError, reportLoad, withPositions,
} from './utils.js';
import { searchContacts, sortContacts } from '../shared/search.js';

const args = parseArgs(process.argv.slice(2));
const query = args['_positional'] ?? args['query'] ?? '';
const sortKey = parseSortKey(args['sort']);

if (!query.trim()) {
  console.error('Usage: npx tsx src/searchContacts.ts "search term" [--sort name|phone|email]');
  process.exit(1);
}

if (args['sort'] !== undefined && !sortKey) {
  console.error(`❌ Invalid sort key "${args['sort']}". Must be: name, phone, or email`);
  process.exit(1);
}

try {
  const store = openStore();
  reportLoad(store);

  const contacts = store.all();
  const matches = searchContacts(contacts, query.trim());

  if (matches.length === 0) {
    console.log(`No contacts found for "${query}"`);
    process.exit(0);
  }

  const rows = withPositions(contacts, sortKey ? sortContacts(matches, sortKey) : matches);
  console.log(`🔍 ${matches.length} contact(s) matching "${query}":\n`);
  for (const row of rows) {
    console.log(`  ${formatContact(row.contact, row.index)}`);
  }
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
