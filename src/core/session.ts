import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ProxyAgent, setGlobalDispatcher } from "undici";
import type { CacheData, ConnectionConfig, ToolSchema } from "./types.js";
import { extractToolSchema } from "./schema.js";
import { ToolNotFoundError, TransportError, errorMessage } from "./errors.js";
import { SCHEMA_TIMEOUT_MS, VERSION } from "../utils/constants.js";

export type TransportFactory = (connection: ConnectionConfig) => Transport;

export interface SessionOptions {
  /** Deadline for connecting and for each list request */
  timeoutMs?: number;
  /** Replaces the HTTP transports, e.g. with an in-memory pair in tests */
  transportFactory?: TransportFactory;
}

/**
 * A connected MCP client plus the deadline its requests run under.
 */
export interface ServerSession {
  client: Client;
  timeoutMs?: number;
  close(): Promise<void>;
}

/**
 * Connect to an MCP server over SSE or Streamable HTTP.
 *
 * Uses the MCP protocol: initialize → notifications/initialized
 */
export async function createSession(
  connection: ConnectionConfig,
  options: SessionOptions = {}
): Promise<ServerSession> {
  const transport = (options.transportFactory ?? createTransport)(connection);
  const client = new Client(
    { name: connection.clientName, version: VERSION },
    { capabilities: {} }
  );

  try {
    await withDeadline(
      client.connect(transport, requestOptions(options.timeoutMs)),
      options.timeoutMs,
      "connect"
    );
  } catch (err) {
    await closeQuietly(client);
    if (err instanceof TransportError) throw err;
    throw new TransportError(`connect to ${connection.serverUrl}: ${errorMessage(err)}`, err);
  }

  return {
    client,
    timeoutMs: options.timeoutMs,
    close: () => closeQuietly(client),
  };
}

/**
 * Build the HTTP transport for a connection. The bearer token is sent on every
 * request; a proxy URL routes all fetches through an undici ProxyAgent.
 */
export function createTransport(connection: ConnectionConfig): Transport {
  const url = parseUrl(connection.serverUrl, "server URL");

  if (connection.proxy) {
    setGlobalDispatcher(new ProxyAgent(parseUrl(connection.proxy, "proxy URL").href));
  }

  const requestInit: RequestInit | undefined = connection.token
    ? { headers: { Authorization: `Bearer ${connection.token}` } }
    : undefined;

  switch (connection.transport.toLowerCase()) {
    case "streamable":
    case "streamable-http":
    case "http":
      return new StreamableHTTPClientTransport(url, { requestInit });
    case "sse":
      return new SSEClientTransport(url, { requestInit });
    default:
      throw new TransportError(
        `unknown transport type '${connection.transport}', supported types: sse, streamable-http`
      );
  }
}

/**
 * Fetch tools, resources and prompts. A kind the server does not support
 * comes back empty rather than failing the whole snapshot.
 */
export async function fetchServerData(session: ServerSession): Promise<CacheData> {
  const { client } = session;
  const options = requestOptions(session.timeoutMs);

  const [tools, resources, prompts] = await Promise.all([
    collectPages(async (cursor) => {
      const res = await client.listTools({ cursor }, options);
      return { items: res.tools, nextCursor: res.nextCursor };
    }),
    collectPages(async (cursor) => {
      const res = await client.listResources({ cursor }, options);
      return { items: res.resources, nextCursor: res.nextCursor };
    }),
    collectPages(async (cursor) => {
      const res = await client.listPrompts({ cursor }, options);
      return { items: res.prompts, nextCursor: res.nextCursor };
    }),
  ]);

  return { tools, resources, prompts };
}

/**
 * Look up one tool and normalize its input schema.
 */
export async function getToolSchema(
  session: ServerSession,
  toolName: string,
  timeoutMs: number = SCHEMA_TIMEOUT_MS
): Promise<ToolSchema> {
  const res = await session.client
    .listTools({}, requestOptions(timeoutMs))
    .catch((err: unknown) => {
      throw new TransportError(`failed to list tools: ${errorMessage(err)}`, err);
    });

  const tool = res.tools.find((t) => t.name === toolName);
  if (!tool) {
    throw new ToolNotFoundError(toolName);
  }

  return extractToolSchema(tool.inputSchema);
}

export async function callTool(
  session: ServerSession,
  toolName: string,
  args: Record<string, unknown>
): Promise<unknown> {
  try {
    return await session.client.callTool({ name: toolName, arguments: args });
  } catch (err) {
    throw new TransportError(`call tool ${JSON.stringify(toolName)}: ${errorMessage(err)}`, err);
  }
}

/**
 * Follow `nextCursor` until the server stops returning one. Any failure
 * yields an empty list.
 */
async function collectPages<T>(
  fetchPage: (cursor: string | undefined) => Promise<{ items: T[]; nextCursor?: string }>
): Promise<T[]> {
  const items: T[] = [];
  let cursor: string | undefined;
  try {
    do {
      const page = await fetchPage(cursor);
      items.push(...page.items);
      cursor = page.nextCursor;
    } while (cursor);
  } catch {
    return [];
  }
  return items;
}

function requestOptions(timeoutMs: number | undefined): { timeout: number } | undefined {
  return timeoutMs === undefined ? undefined : { timeout: timeoutMs };
}

/**
 * Reject with a TransportError when `promise` has not settled within
 * `timeoutMs`. Without a deadline the promise is returned as is.
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  label: string
): Promise<T> {
  if (timeoutMs === undefined) return promise;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function parseUrl(value: string, label: string): URL {
  try {
    return new URL(value);
  } catch (err) {
    throw new TransportError(`invalid ${label}: ${value}`, err);
  }
}

async function closeQuietly(client: Client): Promise<void> {
  try {
    await client.close();
  } catch {
    // Already closed or never connected
  }
}
