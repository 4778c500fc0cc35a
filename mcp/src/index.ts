import { createApp } from './server.js';
import { openStore, describeError, resolveDataDir } from '../../src/utils.js';
import type { ContactStore } from '../../src/store.js';

const PORT = parseInt(process.env.PORT ?? '8080', 10);
const SERVICE_URL = process.env.SERVICE_URL ?? `http://localhost:${PORT}`;
const mcpServerUrl = new URL('/mcp', SERVICE_URL);

function loadStore(): ContactStore {
  try {
    return openStore(resolveDataDir());
  } catch (err) {
    console.error(`❌ ${describeError(err)}`);
    process.exit(1);
  }
}

const store = loadStore();

const load = store.lastLoad;
if (load.status === 'unreadable') {
  console.warn(`⚠  ${load.message}`);
} else {
  console.log(load.message);
}

const token = process.env.CONTACT_BOOK_TOKEN;
if (!token) {
  console.warn('⚠  CONTACT_BOOK_TOKEN is not set; /mcp accepts unauthenticated requests.');
}

// ── Start ────────────────────────────────────────────────────────────
createApp(store, { token }).listen(PORT, () => {
  console.log(`MCP server listening on port ${PORT}`);
  console.log(`MCP endpoint: ${mcpServerUrl.toString()}`);
});
