import { openStore, parseArgs, resolveTarget, formatContact, describeError, reportLoad } from './utils.js';

const args = parseArgs(process.argv.slice(2));

if (args['index'] === undefined && args['phone'] === undefined) {
  console.error('Usage: npx tsx src/updateContact.ts (--index N | --phone 5551234567) [--name "Name"] [--phone-new 5557654321] [--email name@example.com]');
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

  const current = store.get(index);
  const updated = store.update(index, {
    name: args['name'] ?? current.name,
    phone: args['phone-new'] ?? current.phone,
    email: args['email'] ?? current.email,
  });

  console.log(`✅ Updated contact: ${formatContact(updated, index)}`);
  if (current.name !== updated.name) console.log(`   Name: ${current.name} → ${updated.name}`);
  if (current.phone !== updated.phone) console.log(`   Phone: ${current.phone} → ${updated.phone}`);
  if (current.email !== updated.email) console.log(`   Email: ${current.email} → ${updated.email}`);
} catch (err) {
  console.error(`❌ ${describeError(err)}`);
  process.exit(1);
}
