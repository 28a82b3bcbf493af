import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { listCommand } from "../../src/commands/list.js";
import { execCommand } from "../../src/commands/exec.js";
import { cacheClearCommand, cacheInfoCommand } from "../../src/commands/cache.js";
import { completeCommand } from "../../src/commands/complete.js";
import type { CommandDeps, GlobalOptions } from "../../src/commands/context.js";
import { FileCache } from "../../src/core/cache.js";
import { loadServerData } from "../../src/core/loader.js";
import { completeParameterNames, completeToolNames } from "../../src/core/completion.js";
import { TransportError } from "../../src/core/errors.js";
import type { ConnectionConfig } from "../../src/core/types.js";
import type { TransportFactory } from "../../src/core/session.js";
import { createLogger, type Logger } from "../../src/utils/logger.js";
import { createTestServer, offlineTransport, type TestServer } from "../helpers/test-server.js";

const SERVER_URL = "http://localhost:3000/sse";

let dir: string;
let out: string[];
let logs: string[];
let logger: Logger;
let server: TestServer;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "mcp-invoke-workflow-"));
  out = [];
  logs = [];
  logger = createLogger({ color: false, verbose: false, write: (line) => logs.push(line) });
  server = createTestServer();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  expect(server.errors).toEqual([]);
});

function deps(transportFactory: TransportFactory = server.transportFactory): CommandDeps {
  return {
    out: (line) => out.push(line),
    env: { XDG_CONFIG_HOME: join(dir, "xdg") },
    cwd: dir,
    interactive: false,
    cacheDir: join(dir, "cache"),
    transportFactory,
    logger,
  };
}

const globals: GlobalOptions = { sse: SERVER_URL, color: false };

const connection: ConnectionConfig = {
  serverUrl: SERVER_URL,
  transport: "sse",
  clientName: "mcp-invoke",
};

describe("mcp-invoke end-to-end workflow", () => {
  describe("list command", () => {
    it("lists everything the server offers", async () => {
      const code = await listCommand(undefined, {}, globals, deps());
      expect(code).toBe(0);
      expect(out).toEqual([
        "tool:generate",
        "tool:fail",
        "resource:file:///notes.txt",
        "prompt:summarize",
      ]);
    });

    it("filters by type and prints JSON lines", async () => {
      const code = await listCommand("prompts", { json: true }, globals, deps());
      expect(code).toBe(0);
      expect(out).toEqual(['{"name":"summarize"}']);
    });

    it("rejects an unknown type with a usage error", async () => {
      const code = await listCommand("widgets", {}, globals, deps());
      expect(code).toBe(2);
      expect(logs).toEqual([
        "✗ unknown list type 'widgets', supported types: tools, resources, prompts",
      ]);
    });

    it("requires a server", async () => {
      const code = await listCommand(undefined, {}, { color: false }, deps());
      expect(code).toBe(2);
      expect(logs).toEqual(["✗ must specify either --sse=<url> or --http=<url>"]);
    });

    it("falls back to the cache when the server is unavailable", async () => {
      expect(await listCommand("tools", {}, globals, deps())).toBe(0);
      out.length = 0;

      const code = await listCommand("tools", {}, globals, deps(offlineTransport));
      expect(code).toBe(0);
      expect(out).toEqual(["tool:generate", "tool:fail"]);
      expect(logs).toEqual(["⚠ Using cached data (server unavailable)"]);
    });

    it("fails without a server or a cache", async () => {
      const code = await listCommand("tools", {}, globals, deps(offlineTransport));
      expect(code).toBe(1);
      expect(logs).toEqual(["✗ create session: offline"]);
    });
  });

  describe("exec command", () => {
    it("converts parameters by the tool schema", async () => {
      const code = await execCommand(
        "generate",
        { param: ["prompt=hello", "tokens=1000", "stream=yes"], schema: true },
        globals,
        deps()
      );

      expect(code).toBe(0);
      expect(server.calls).toEqual([
        { name: "generate", arguments: { prompt: "hello", tokens: 1000, stream: true } },
      ]);
      expect(out).toHaveLength(1);
      expect(JSON.parse(out[0])).toMatchObject({
        content: [{ type: "text", text: '{"prompt":"hello","tokens":1000,"stream":true}' }],
      });
    });

    it("warns about parameters the schema does not declare", async () => {
      const code = await execCommand(
        "generate",
        { param: ["prompt=hi", "tokens=5", "extra=1"], schema: true },
        globals,
        deps()
      );

      expect(code).toBe(0);
      expect(logs).toEqual(['⚠ parameter "extra" not found in schema']);
      expect(server.calls[0].arguments).toEqual({ prompt: "hi", tokens: 5, extra: "1" });
    });

    it("sends strings with --no-schema", async () => {
      await execCommand(
        "generate",
        { param: ["prompt=hi", "tokens=5"], schema: false },
        globals,
        deps()
      );
      expect(server.calls[0].arguments).toEqual({ prompt: "hi", tokens: "5" });
    });

    it("stops before calling the tool when conversion fails", async () => {
      const code = await execCommand(
        "generate",
        { param: ["prompt=hi", "tokens=3.14"], schema: true },
        globals,
        deps()
      );

      expect(code).toBe(1);
      expect(server.calls).toEqual([]);
      expect(logs).toEqual([
        '✗ parameter "tokens" (type: integer): cannot convert "3.14"\n' +
          "Hint: Use whole numbers like 42 or -10",
      ]);
    });

    it("reports missing required parameters", async () => {
      const code = await execCommand(
        "generate",
        { param: ["prompt=hi"], schema: true },
        globals,
        deps()
      );
      expect(code).toBe(1);
      expect(logs).toEqual(["✗ missing required parameters: tokens"]);
    });

    it("reports an unknown tool", async () => {
      const code = await execCommand("nope", { param: [], schema: true }, globals, deps());
      expect(code).toBe(1);
      expect(logs).toEqual(['✗ tool "nope" not found']);
    });

    it("exits 1 when the tool reports an error", async () => {
      const code = await execCommand("fail", { param: [], schema: true }, globals, deps());
      expect(code).toBe(1);
      expect(JSON.parse(out[0])).toMatchObject({ isError: true });
    });

    it("pretty-prints with --pretty", async () => {
      await execCommand(
        "generate",
        { param: ["prompt=a", "tokens=1"], schema: true, pretty: true },
        globals,
        deps()
      );
      expect(out[0]).toBe(JSON.stringify(JSON.parse(out[0]), null, 2));
      expect(out[0].startsWith("{\n  ")).toBe(true);
    });
  });

  describe("cache commands", () => {
    it("shows and clears cached entries", async () => {
      await listCommand("tools", {}, globals, deps());
      out.length = 0;

      expect(await cacheInfoCommand(globals, deps())).toBe(0);
      expect(out[0]).toBe(`Cache directory: ${join(dir, "cache")}`);
      expect(out[1]).toBe("Total files: 1");
      expect(out).toContain("    Tools: 2, Resources: 1, Prompts: 1");

      out.length = 0;
      expect(await cacheClearCommand(globals, deps())).toBe(0);
      expect(out).toEqual(["Cache cleared successfully"]);
      expect(readdirSync(join(dir, "cache"))).toEqual([]);
    });

    it("reports an empty cache", async () => {
      expect(await cacheInfoCommand(globals, deps())).toBe(0);
      expect(out).toEqual(["Cache is empty", `Cache directory: ${join(dir, "cache")}`]);
    });
  });

  describe("loadServerData", () => {
    it("refreshes the cache after a successful fetch", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      const data = await loadServerData(connection, {
        cache,
        logger,
        session: { transportFactory: server.transportFactory },
      });

      expect(data.tools.map((t) => t.name)).toEqual(["generate", "fail"]);
      expect((await cache.load()).data).toEqual(data);
    });

    it("throws a TransportError without a server or a cache", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      await expect(
        loadServerData(connection, {
          cache,
          logger,
          session: { transportFactory: offlineTransport },
        })
      ).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe("completion", () => {
    it("queries the server on a miss and fills the cache in the background", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      const completionDeps = { cache, logger, transportFactory: server.transportFactory };

      const first = await completeToolNames(connection, completionDeps, "gen");
      expect(first.candidates).toEqual(["generate"]);
      expect(first.refresh).not.toBeNull();
      await first.refresh;

      expect((await cache.load()).data?.tools).toHaveLength(2);

      const second = await completeToolNames(connection, completionDeps);
      expect(second).toEqual({ candidates: ["generate", "fail"], refresh: null });
    });

    it("offers sorted parameter names", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      const result = await completeParameterNames(
        connection,
        "generate",
        { cache, logger, transportFactory: server.transportFactory },
        "s"
      );
      expect(result.candidates).toEqual(["stream="]);
      await result.refresh;
    });

    it("returns nothing when the server is unavailable", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      const result = await completeToolNames(connection, {
        cache,
        logger,
        transportFactory: offlineTransport,
      });
      expect(result).toEqual({ candidates: [], refresh: null });
    });

    it("prints candidates from the complete command", async () => {
      const cache = new FileCache(connection, { cacheDir: join(dir, "cache") });
      await cache.save({
        tools: [
          {
            name: "generate",
            inputSchema: { type: "object", properties: { tokens: {}, prompt: {} } },
          },
        ],
        resources: [],
        prompts: [],
      });

      const code = await completeCommand(
        { kind: "params", tool: "generate" },
        undefined,
        globals,
        deps()
      );
      expect(code).toBe(0);
      expect(out).toEqual(["prompt=", "tokens="]);
    });

    it("exits cleanly without a server", async () => {
      const code = await completeCommand({ kind: "tools" }, "", { color: false }, deps());
      expect(code).toBe(0);
      expect(out).toEqual([]);
    });
  });
});
