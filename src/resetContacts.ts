import { openStore, parseArgs, describeError, reportLoad } from './utils.js';

const args = parseArgs(process.argv.slice(2));

try {
  const store = openStore();
  reportLoad(store);

  if (args['confirm'] !== 'true') {
    console.log(`This will delete ALL ${store.size} contact(s) from ${store.filePath}. It cannot be undone.`);
    console.log('Re-run with --confirm to proceed.');
    process.exit(0);
  }

  const count = store.size;
  store.clear();
  console.log(`🗑  Reset contact book: removed ${count} contact(s).`);
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
