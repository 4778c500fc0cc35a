/**
 * HTTP tests for the express app: the app listens on an ephemeral port on
 * loopback and is driven with fetch.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';
import { createApp } from '../mcp/src/server.js';
import type { AppOptions } from '../mcp/src/server.js';
import { ContactStore } from '../src/store.js';
import type { Contact } from '../shared/types.js';

// ── Test helpers ─────────────────────────────────────────────────────

let DATA_DIR: string;
let store: ContactStore;
let server: HttpServer | undefined;

function tempDir(): string {
  const dir = join(process.env.TMPDIR ?? '/tmp', `contact-book-test-${randomBytes(4).toString('hex')}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function start(options: AppOptions = {}): Promise<string> {
  return new Promise((resolve, reject) => {
    const listening = createApp(store, options).listen(0, '127.0.0.1', () => {
      const address = listening.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`unexpected address: ${String(address)}`));
        return;
      }
      resolve(`http://127.0.0.1:${address.port}`);
    });
    server = listening;
  });
}

function stop(): Promise<void> {
  const current = server;
  server = undefined;
  if (!current) return Promise.resolve();
  current.closeAllConnections();
  return new Promise((resolve, reject) => {
    current.close(err => (err ? reject(err) : resolve()));
  });
}

const MCP_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json, text/event-stream',
};

const initializeBody = JSON.stringify({
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'contact-book-test', version: '1.0.0' },
  },
});

const listToolsBody = JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} });

const alice: Contact = { name: 'Alice', phone: '1234567890', email: 'a@b.com' };
const bob: Contact = { name: 'Bob', phone: '5551234', email: 'bob@mail.org' };

// ═══════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════

describe('createApp', () => {
  beforeEach(() => {
    DATA_DIR = tempDir();
    store = new ContactStore(join(DATA_DIR, 'contacts.json'));
    store.load();
  });

  afterEach(async () => {
    await stop();
    rmSync(DATA_DIR, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('reports the number of stored contacts', async () => {
      store.save([alice, bob]);
      const base = await start();

      const res = await fetch(`${base}/health`);
      assert.equal(res.status, 200);
      assert.deepEqual(await res.json(), { status: 'ok', contacts: 2 });
    });

    it('needs no token when one is configured', async () => {
      const base = await start({ token: 'test-secret' });

      const res = await fetch(`${base}/health`);
      assert.equal(res.status, 200);
      assert.deepEqual(await res.json(), { status: 'ok', contacts: 0 });
    });
  });

  describe('/mcp sessions', () => {
    it('opens a session on initialize', async () => {
      const base = await start();

      const res = await fetch(`${base}/mcp`, { method: 'POST', headers: MCP_HEADERS, body: initializeBody });
      assert.equal(res.status, 200);
      assert.match(res.headers.get('mcp-session-id') ?? '', /^cb_[0-9a-f-]{36}$/);
      assert.match(await res.text(), /"serverInfo":\{"name":"contact-book","version":"1\.0\.0"\}/);
    });

    it('rejects a request that is not initialize without a session', async () => {
      const base = await start();

      const res = await fetch(`${base}/mcp`, { method: 'POST', headers: MCP_HEADERS, body: listToolsBody });
      assert.equal(res.status, 400);
      assert.deepEqual(await res.json(), {
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
        id: null,
      });
    });

    it('rejects an unknown session id on POST', async () => {
      const base = await start();

      const res = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: { ...MCP_HEADERS, 'mcp-session-id': 'cb_unknown' },
        body: initializeBody,
      });
      assert.equal(res.status, 400);
      assert.deepEqual(await res.json(), {
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
        id: null,
      });
    });

    it('rejects GET and DELETE without a known session', async () => {
      const base = await start();

      const get = await fetch(`${base}/mcp`, { headers: { 'mcp-session-id': 'cb_unknown' } });
      assert.equal(get.status, 400);
      assert.equal(await get.text(), 'Invalid or missing session ID');

      const del = await fetch(`${base}/mcp`, { method: 'DELETE' });
      assert.equal(del.status, 400);
      assert.equal(await del.text(), 'Invalid or missing session ID');
    });
  });

  describe('bearer token', () => {
    it('rejects /mcp without an Authorization header', async () => {
      const base = await start({ token: 'test-secret' });

      const res = await fetch(`${base}/mcp`, { method: 'POST', headers: MCP_HEADERS, body: initializeBody });
      assert.equal(res.status, 401);
      assert.deepEqual(await res.json(), { error: 'invalid_token', error_description: 'Missing Authorization header' });
    });

    it('rejects /mcp with the wrong token', async () => {
      const base = await start({ token: 'test-secret' });

      const res = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: { ...MCP_HEADERS, Authorization: 'Bearer wrong-secret' },
        body: initializeBody,
      });
      assert.equal(res.status, 401);
      assert.deepEqual(await res.json(), { error: 'invalid_token', error_description: 'Invalid access token' });
    });

    it('opens a session with the configured token', async () => {
      const base = await start({ token: 'test-secret' });

      const res = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: { ...MCP_HEADERS, Authorization: 'Bearer test-secret' },
        body: initializeBody,
      });
      assert.equal(res.status, 200);
      assert.match(res.headers.get('mcp-session-id') ?? '', /^cb_/);
      await res.text();
    });
  });
});
