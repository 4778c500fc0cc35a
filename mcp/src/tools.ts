import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const sortBy = {
  type: 'string',
  enum: ['name', 'phone', 'email'],
  description: 'Order results by name (A-Z, case-insensitive), phone (numeric ascending) or email',
};

const index = {
  type: 'integer',
  minimum: 0,
  description: 'Position of the contact in the full list, as returned by list_contacts or search_contacts',
};

export const TOOLS: Tool[] = [
  {
    name: 'list_contacts',
    description: 'List every contact with its position in the contact book.',
    inputSchema: {
      type: 'object' as const,
      properties: { sortBy },
    },
  },
  {
    name: 'search_contacts',
    description: 'Find contacts whose name, phone or email contains the query (case-insensitive).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Text to look for in name, phone and email' },
        sortBy,
      },
      required: ['query'],
    },
  },
  {
    name: 'get_contact',
    description: 'Get a single contact by position.',
    inputSchema: {
      type: 'object' as const,
      properties: { index },
      required: ['index'],
    },
  },
  {
    name: 'add_contact',
    description: 'Add a new contact. Name, phone (digits only) and email (name@domain.tld) are all required. Present the record to the user for confirmation before calling this tool.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        name: { type: 'string', description: 'Full name' },
        phone: { type: 'string', description: 'Phone number, digits only' },
        email: { type: 'string', description: 'Email address' },
      },
      required: ['name', 'phone', 'email'],
    },
  },
  {
    name: 'update_contact',
    description: 'Replace fields of the contact at a position. Fields that are left out keep their current value.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        index,
        name: { type: 'string' },
        phone: { type: 'string' },
        email: { type: 'string' },
      },
      required: ['index'],
    },
  },
  {
    name: 'delete_contact',
    description: 'Delete the contact at a position. Without confirm: true, only returns the contact that would be deleted so the user can confirm.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        index,
        confirm: { type: 'boolean', description: 'Set true once the user has confirmed the deletion' },
      },
      required: ['index'],
    },
  },
  {
    name: 'reset_contacts',
    description: 'Delete ALL contacts. This cannot be undone. Without confirm: true, only reports how many contacts would be erased.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        confirm: { type: 'boolean', description: 'Set true once the user has confirmed the reset' },
      },
    },
  },
];
