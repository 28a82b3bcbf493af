import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import {
  CallToolRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { TransportFactory } from "../../src/core/session.js";

export interface TestServer {
  /** Hands the client one end of a fresh in-memory pair per connection */
  transportFactory: TransportFactory;
  /** Arguments of every tools/call the server received */
  calls: Array<{ name: string; arguments: Record<string, unknown> | undefined }>;
  /** Errors from connecting the server side */
  errors: unknown[];
}

const TOOLS = [
  {
    name: "generate",
    description: "Generate text",
    inputSchema: {
      type: "object" as const,
      properties: {
        prompt: { type: "string" },
        tokens: { type: "integer" },
        stream: { type: "boolean", default: false },
      },
      required: ["prompt", "tokens"],
    },
  },
  {
    name: "fail",
    description: "Always reports an error",
    inputSchema: { type: "object" as const, properties: {} },
  },
];

/**
 * An MCP server that runs in the test process. Each connection gets its own
 * server instance; `generate` echoes its arguments back as JSON text.
 */
export function createTestServer(): TestServer {
  const calls: TestServer["calls"] = [];
  const errors: unknown[] = [];

  const transportFactory: TransportFactory = () => {
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();

    const server = new Server(
      { name: "test-server", version: "1.0.0" },
      { capabilities: { tools: {}, resources: {}, prompts: {} } }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      calls.push({ name: request.params.name, arguments: request.params.arguments });
      if (request.params.name === "fail") {
        return { content: [{ type: "text", text: "boom" }], isError: true };
      }
      return {
        content: [{ type: "text", text: JSON.stringify(request.params.arguments ?? {}) }],
      };
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: [{ uri: "file:///notes.txt", name: "notes" }],
    }));

    server.setRequestHandler(ListPromptsRequestSchema, async () => ({
      prompts: [{ name: "summarize" }],
    }));

    server.connect(serverSide).catch((err: unknown) => errors.push(err));
    return clientSide;
  };

  return { transportFactory, calls, errors };
}

/** A transport factory for a server that cannot be reached. */
export const offlineTransport: TransportFactory = () => {
  throw new Error("offline");
};
