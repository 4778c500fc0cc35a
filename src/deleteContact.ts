import { openStore, parseArgs, resolveTarget, formatContact, describeError, reportLoad } from './utils.js';

const args = parseArgs(process.argv.slice(2));

if (args['index'] === undefined && args['phone'] === undefined) {
  console.error('Usage: npx tsx src/deleteContact.ts (--index N | --phone 5551234567) [--confirm]');
  process.exit(1);
}

try {
  const store = openStore();
  reportLoad(store);

  const index = resolveTarget(args, store);
  if (index === null || index < 0) {
    console.error(`❌ No contact found for ${args['index'] !== undefined ? `index "${args['index']}"` : `phone "${args['phone']}"`}`);
    process.exit(1);
  }

  const target = store.get(index);
  if (args['confirm'] !== 'true') {
    console.log(`About to delete: ${formatContact(target, index)}`);
    console.log('Re-run with --confirm to delete it.');
    process.exit(0);
  }

  const removed = store.delete(index);
  console.log(`🗑  Deleted contact: ${formatContact(removed)}`);
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
