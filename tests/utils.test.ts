import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { randomBytes } from 'node:crypto';
import {
  resolveDataDir, readConfig, openStore, parseArgs, parseSortKey, resolveTarget,
  formatContact, describeError, withPositions,
} from '../src/utils.js';
import { ContactStore } from '../src/store.js';
import { ConfigError, NotFoundError } from '../shared/errors.js';
import { DEFAULT_CONFIG } from '../shared/constants.js';
import { sortByName } from '../shared/search.js';
import type { Contact } from '../shared/types.js';

let DATA_DIR: string;

function tempDir(): string {
  const dir = join(process.env.TMPDIR ?? '/tmp', `contact-book-test-${randomBytes(4).toString('hex')}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeData(name: string, data: unknown) {
  writeFileSync(join(DATA_DIR, name), JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

const alice: Contact = { name: 'Alice', phone: '1234567890', email: 'a@b.com' };
const bob: Contact = { name: 'Bob', phone: '5551234', email: 'bob@mail.org' };

describe('config', () => {
  beforeEach(() => {
    DATA_DIR = tempDir();
  });

  afterEach(() => {
    rmSync(DATA_DIR, { recursive: true, force: true });
  });

  it('resolves the data directory from the environment', () => {
    assert.equal(resolveDataDir({ CONTACT_BOOK_DATA_DIR: DATA_DIR }), resolve(DATA_DIR));
    assert.match(resolveDataDir({}), /[\\/]data$/);
  });

  it('uses defaults when there is no config file', () => {
    assert.deepEqual(readConfig(DATA_DIR), DEFAULT_CONFIG);
  });

  it('fills omitted fields with defaults', () => {
    writeData('config.json', { phoneMinDigits: 10, phoneMaxDigits: 10 });
    assert.deepEqual(readConfig(DATA_DIR), {
      contactsFile: 'contacts.json',
      phoneMinDigits: 10,
      phoneMaxDigits: 10,
      rejectDuplicatePhones: false,
    });
  });

  it('rejects a config file that is not JSON', () => {
    writeFileSync(join(DATA_DIR, 'config.json'), '{', 'utf-8');
    assert.throws(() => readConfig(DATA_DIR), ConfigError);
  });

  it('rejects out-of-order phone limits', () => {
    writeData('config.json', { phoneMinDigits: 12, phoneMaxDigits: 8 });
    assert.throws(
      () => readConfig(DATA_DIR),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.message, `Invalid config file ${join(DATA_DIR, 'config.json')}: phoneMaxDigits: phoneMinDigits must not exceed phoneMaxDigits`);
        return true;
      },
    );
  });

  it('opens and loads the configured contacts file with the configured rules', () => {
    writeData('config.json', { contactsFile: 'book.json', rejectDuplicatePhones: true });
    writeData('book.json', [alice]);

    const store = openStore(DATA_DIR);
    assert.equal(store.filePath, join(DATA_DIR, 'book.json'));
    assert.deepEqual(store.all(), [alice]);
    assert.throws(() => store.add({ ...bob, phone: alice.phone }), { code: 'DUPLICATE' });
  });
});

describe('parseArgs', () => {
  it('reads --flag value pairs, bare flags and positional words', () => {
    assert.deepEqual(
      parseArgs(['--name', 'Alice Smith', 'extra', '--confirm', '--index', '0', 'words']),
      { name: 'Alice Smith', confirm: 'true', index: '0', _positional: 'extra words' },
    );
  });

  it('treats a flag followed by another flag as a boolean', () => {
    assert.deepEqual(parseArgs(['--confirm', '--phone', '555']), { confirm: 'true', phone: '555' });
  });
});

describe('parseSortKey', () => {
  it('accepts known keys and rejects others', () => {
    assert.equal(parseSortKey('phone'), 'phone');
    assert.equal(parseSortKey('age'), null);
    assert.equal(parseSortKey(undefined), null);
  });
});

describe('resolveTarget', () => {
  const store = new ContactStore(join('/nonexistent', 'contacts.json'));

  it('reads --index as a position', () => {
    assert.equal(resolveTarget({ index: '3' }, store), 3);
    assert.equal(resolveTarget({ index: 'x' }, store), null);
    assert.equal(resolveTarget({}, store), null);
  });

  it('looks up --phone in the store', () => {
    assert.equal(resolveTarget({ phone: '12345' }, store), -1);
  });
});

describe('withPositions', () => {
  it('pairs sorted records with their stored positions', () => {
    const all = [bob, alice];
    assert.deepEqual(withPositions(all, sortByName(all)), [
      { contact: alice, index: 1 },
      { contact: bob, index: 0 },
    ]);
  });
});

describe('formatting', () => {
  it('formats a contact with and without its position', () => {
    assert.equal(formatContact(alice, 2), '[2] Alice (1234567890) <a@b.com>');
    assert.equal(formatContact(alice), 'Alice (1234567890) <a@b.com>');
  });

  it('describes domain errors by message and others as unexpected', () => {
    assert.equal(describeError(new NotFoundError(0, 0)), 'No contact at position 0: the contact book is empty.');
    assert.equal(describeError(new Error('boom')), 'Unexpected error: boom');
    assert.equal(describeError('boom'), 'Unexpected error: boom');
  });
});
