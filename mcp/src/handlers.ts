import { z } from 'zod';
import { searchContacts, sortContacts, findDuplicatePhone } from '../../shared/search.js';
import { describeIssues, sortKeySchema } from '../../shared/schema.js';
import {
  ContactBookError, ValidationError, DuplicateContactError, NotFoundError,
} from '../../shared/errors.js';
import { withPositions } from '../../src/utils.js';
import type { ContactStore } from '../../src/store.js';
import type { Contact } from '../../shared/types.js';

export type ToolResult = Record<string, unknown>;
export type ToolHandler = (args: unknown) => ToolResult;

// ── Argument schemas ─────────────────────────────────────────────────
// Contact fields stay optional here so the validator reports what is missing.
const fieldSchema = z.string().nullish();
const indexSchema = z.number().int().min(0);

const listArgs = z.object({ sortBy: sortKeySchema.optional() });
const searchArgs = z.object({ query: z.string(), sortBy: sortKeySchema.optional() });
const getArgs = z.object({ index: indexSchema });
const addArgs = z.object({ name: fieldSchema, phone: fieldSchema, email: fieldSchema });
const updateArgs = addArgs.extend({ index: indexSchema });
const deleteArgs = z.object({ index: indexSchema, confirm: z.boolean().optional() });
const resetArgs = z.object({ confirm: z.boolean().optional() });

function positioned(all: Contact[], subset: Contact[]): Array<Contact & { index: number }> {
  return withPositions(all, subset).map(({ contact, index }) => ({ index, ...contact }));
}

function errorResult(err: ContactBookError): ToolResult {
  const result: ToolResult = { error: err.message, code: err.code };
  if (err instanceof ValidationError) {
    result['reason'] = err.reason;
    result['failures'] = err.failures;
  } else if (err instanceof DuplicateContactError) {
    result['existingIndex'] = err.existingIndex;
    result['existingContact'] = err.existing;
  } else if (err instanceof NotFoundError) {
    result['index'] = err.index;
  }
  return result;
}

/**
 * Wraps a handler body with argument parsing. Domain errors come back as
 * `{ error, code }` results; anything else propagates to the MCP layer.
 */
function handler<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: (args: T) => ToolResult): ToolHandler {
  return (raw: unknown) => {
    const parsed = schema.safeParse(raw ?? {});
    if (!parsed.success) {
      return { error: `Invalid arguments: ${describeIssues(parsed.error)}` };
    }
    try {
      return body(parsed.data);
    } catch (err) {
      if (err instanceof ContactBookError) return errorResult(err);
      throw err;
    }
  };
}

export function createToolHandlers(store: ContactStore): Record<string, ToolHandler> {
  // The CLI scripts write the same file, so every call starts from what is on disk.
  const tool = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: (args: T) => ToolResult): ToolHandler =>
    handler(schema, args => {
      store.load();
      return body(args);
    });

  return {
    // ── list_contacts ────────────────────────────────────────────────
    list_contacts: tool(listArgs, args => {
      const all = store.all();
      const ordered = args.sortBy ? sortContacts(all, args.sortBy) : all;
      return { count: all.length, contacts: positioned(all, ordered) };
    }),

    // ── search_contacts ──────────────────────────────────────────────
    search_contacts: tool(searchArgs, args => {
      const all = store.all();
      const matches = searchContacts(all, args.query);
      const ordered = args.sortBy ? sortContacts(matches, args.sortBy) : matches;
      return { count: matches.length, contacts: positioned(all, ordered) };
    }),

    // ── get_contact ──────────────────────────────────────────────────
    get_contact: tool(getArgs, args => ({
      contact: { index: args.index, ...store.get(args.index) },
    })),

    // ── add_contact ──────────────────────────────────────────────────
    add_contact: tool(addArgs, args => {
      const phone = (args.phone ?? '').trim();
      const dup = phone ? findDuplicatePhone(store.all(), phone) : -1;
      const possibleDuplicate = dup >= 0 ? { index: dup, ...store.get(dup) } : undefined;

      const created = store.add(args);
      const result: ToolResult = { created: { index: store.size - 1, ...created } };
      if (possibleDuplicate) {
        result['warning'] = `Another contact already uses phone ${phone}: ${possibleDuplicate.name}. Remove one of them if this is the same person.`;
        result['possibleDuplicate'] = possibleDuplicate;
      }
      return result;
    }),

    // ── update_contact ───────────────────────────────────────────────
    update_contact: tool(updateArgs, args => {
      const current = store.get(args.index);
      const updated = store.update(args.index, {
        name: args.name ?? current.name,
        phone: args.phone ?? current.phone,
        email: args.email ?? current.email,
      });
      return { updated: { index: args.index, ...updated }, previous: current };
    }),

    // ── delete_contact ───────────────────────────────────────────────
    // Approval check before anything is removed
    delete_contact: tool(deleteArgs, args => {
      const target = store.get(args.index);
      if (!args.confirm) {
        return {
          warning: `This will delete "${target.name}" (${target.phone}). Set confirm: true to proceed.`,
          contact: { index: args.index, ...target },
        };
      }
      return { deleted: store.delete(args.index), remaining: store.size };
    }),

    // ── reset_contacts ───────────────────────────────────────────────
    reset_contacts: tool(resetArgs, args => {
      const count = store.size;
      if (!args.confirm) {
        return {
          warning: `This will delete ALL ${count} contact(s) and cannot be undone. Set confirm: true to proceed.`,
          contactCount: count,
        };
      }
      store.clear();
      return { deletedCount: count };
    }),
  };
}
