import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { requireBearerAuth } from '@modelcontextprotocol/sdk/server/auth/middleware/bearerAuth.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  isInitializeRequest,
} from '@modelcontextprotocol/sdk/types.js';
import express from 'express';
import type { Request } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { TOOLS } from './tools.js';
import { createToolHandlers } from './handlers.js';
import { createStaticTokenVerifier } from './auth.js';
import type { ContactStore } from '../../src/store.js';

export interface AppOptions {
  /** When set, every /mcp request needs `Authorization: Bearer <token>`. */
  token?: string;
}

// ── Create MCP server instance ───────────────────────────────────────
export function createMcpServer(store: ContactStore): Server {
  const toolHandlers = createToolHandlers(store);
  const server = new Server(
    { name: 'contact-book', version: '1.0.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const handler = toolHandlers[name];

    if (!handler) {
      return {
        content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }

    try {
      const result = handler(args ?? {});
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
        isError: true,
      };
    }
  });

  return server;
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

// ── Express app ──────────────────────────────────────────────────────
export function createApp(store: ContactStore, options: AppOptions = {}): express.Express {
  const app = express();

  // Parse JSON request bodies (required for MCP JSON-RPC messages)
  app.use(express.json());

  if (options.token) {
    app.use('/mcp', requireBearerAuth({
      verifier: createStaticTokenVerifier(options.token),
      requiredScopes: [],
    }));
  }

  // Health check (no auth needed)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', contacts: store.size });
  });

  // ── Session-based MCP transport ────────────────────────────────────
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post('/mcp', async (req, res) => {
    const sessionId = sessionIdOf(req);
    const existing = sessionId ? transports.get(sessionId) : undefined;
    console.log(`POST /mcp sessionId=${sessionId ?? 'none'} hasSession=${existing !== undefined} activeSessions=${transports.size}`);

    try {
      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (sessionId || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
          id: null,
        });
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => `cb_${uuidv4()}`,
        onsessioninitialized: (sid) => {
          transports.set(sid, transport);
          console.log(`Session initialized: ${sid}`);
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) {
          transports.delete(sid);
          console.log(`Session closed: ${sid}`);
        }
      };

      await createMcpServer(store).connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // GET opens the SSE stream, DELETE ends the session
  const forwardToSession = async (req: Request, res: express.Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get('/mcp', forwardToSession);
  app.delete('/mcp', forwardToSession);

  return app;
}
