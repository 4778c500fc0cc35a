import { readFileSync, existsSync } from 'node:fs';
import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ContactStore } from './store.js';
import { configSchema, describeIssues, sortKeySchema } from '../shared/schema.js';
import { DEFAULT_CONFIG } from '../shared/constants.js';
import { ConfigError, ContactBookError } from '../shared/errors.js';
import type { Contact, ContactBookConfig, SortKey } from '../shared/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_DATA_DIR = join(__dirname, '..', 'data');

// --- Paths & config ---

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env['CONTACT_BOOK_DATA_DIR'];
  return dir ? resolve(dir) : DEFAULT_DATA_DIR;
}

export function readConfig(dataDir: string): ContactBookConfig {
  const configPath = join(dataDir, 'config.json');
  if (!existsSync(configPath)) return { ...DEFAULT_CONFIG };

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err), err);
  }

  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(configPath, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function openStore(dataDir: string = resolveDataDir()): ContactStore {
  const config = readConfig(dataDir);
  const store = new ContactStore(resolve(dataDir, config.contactsFile), {
    phoneMinDigits: config.phoneMinDigits,
    phoneMaxDigits: config.phoneMaxDigits,
    rejectDuplicatePhones: config.rejectDuplicatePhones,
  });
  store.load();
  return store;
}

// --- Arg parsing helpers ---

export function parseArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        args[key] = next;
        i++;
      } else {
        args[key] = 'true';
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 0) {
    args['_positional'] = positional.join(' ');
  }
  return args;
}

export function parseSortKey(value: string | undefined): SortKey | null {
  if (value === undefined) return null;
  const parsed = sortKeySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Resolves `--index N` or `--phone P` to a list position. Returns null when
 * neither is usable; the store reports positions that hold no record.
 */
export function resolveTarget(args: Record<string, string>, store: ContactStore): number | null {
  if (args['index'] !== undefined) {
    return /^\d+$/.test(args['index']) ? parseInt(args['index'], 10) : null;
  }
  if (args['phone'] !== undefined) {
    return store.indexOfPhone(args['phone']);
  }
  return null;
}

// --- Output ---

export function formatContact(contact: Contact, index?: number): string {
  const position = index === undefined ? '' : `[${index}] `;
  return `${position}${contact.name} (${contact.phone}) <${contact.email}>`;
}

export function describeError(err: unknown): string {
  if (err instanceof ContactBookError) return err.message;
  return err instanceof Error ? `Unexpected error: ${err.message}` : `Unexpected error: ${String(err)}`;
}

/** Prints the load outcome when the file did not load cleanly. */
export function reportLoad(store: ContactStore): void {
  const report = store.lastLoad;
  if (report.status === 'missing') console.log(`ℹ  ${report.message}`);
  if (report.status === 'unreadable') console.warn(`⚠  ${report.message}`);
}

export interface PositionedContact {
  contact: Contact;
  index: number;
}

/**
 * Pairs each record of `subset` with its position in `all`. `subset` must
 * hold the same objects as `all` (as searchContacts and the sorts return).
 */
export function withPositions(all: Contact[], subset: Contact[]): PositionedContact[] {
  const positions = new Map(all.map((contact, index) => [contact, index]));
  return subset.map(contact => ({ contact, index: positions.get(contact) ?? -1 }));
}
