#!/usr/bin/env node
import { Command } from "commander";
import { listCommand } from "./commands/list.js";
import { execCommand } from "./commands/exec.js";
import { cacheClearCommand, cacheInfoCommand } from "./commands/cache.js";
import { completeCommand } from "./commands/complete.js";
import { defaultDeps, type GlobalOptions } from "./commands/context.js";
import { APP_NAME, VERSION } from "./utils/constants.js";

const program = new Command();

program
  .name(APP_NAME)
  .description(
    "Invoke MCP server tools from the command line with schema-typed parameters"
  )
  .version(VERSION)
  .option("--sse <url>", "Use SSE transport with the specified server URL")
  .option("--http <url>", "Use Streamable HTTP transport with the specified server URL")
  .option("-s, --server <profile>", "Use a server profile from the config file")
  .option("--config <path>", "Path to config file (auto-detected if omitted)")
  .option("--proxy <url>", "HTTP proxy URL (e.g., http://proxy.example.com:8080)")
  .option("--token <token>", "Bearer token for authentication")
  .option("-n, --name <client>", "Client name to send in the MCP initialize request")
  .option("--timeout <ms>", "Connection and request timeout in ms")
  .option("--no-color", "Disable colored output")
  .option("--verbose", "Print debug information to stderr");

function globalsOf(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function run(action: () => Promise<number>): Promise<void> {
  process.exitCode = await action();
}

program
  .command("list")
  .description("List tools, resources and prompts from the server (all when no type is given)")
  .argument("[type]", "tools | resources | prompts")
  .option("--json", "Output one JSON object per line")
  .action((type: string | undefined, options: { json?: boolean }, command: Command) =>
    run(() => listCommand(type, options, globalsOf(command), defaultDeps()))
  );

program
  .command("exec")
  .description("Execute a tool on the server with parameters converted per its input schema")
  .argument("<tool>", "Tool name")
  .option(
    "-p, --param <name=value>",
    "Tool parameter (repeatable)",
    collect,
    []
  )
  .option("--no-schema", "Send parameter values as plain strings")
  .option("--pretty", "Pretty-print the result JSON")
  .action(
    (
      tool: string,
      options: { param: string[]; schema: boolean; pretty?: boolean },
      command: Command
    ) => run(() => execCommand(tool, options, globalsOf(command), defaultDeps()))
  );

const cache = program.command("cache").description("Manage the server metadata cache");

cache
  .command("clear")
  .description("Remove all cached server metadata")
  .action((_options: unknown, command: Command) =>
    run(() => cacheClearCommand(globalsOf(command), defaultDeps()))
  );

cache
  .command("info")
  .description("Show cache location, sizes and entry counts")
  .action((_options: unknown, command: Command) =>
    run(() => cacheInfoCommand(globalsOf(command), defaultDeps()))
  );

// Called by shell completion scripts
const complete = new Command("complete").description("Print completion candidates");

complete
  .command("tools")
  .argument("[prefix]")
  .action((prefix: string | undefined, _options: unknown, command: Command) =>
    run(() => completeCommand({ kind: "tools" }, prefix, globalsOf(command), defaultDeps()))
  );

complete
  .command("params")
  .argument("<tool>")
  .argument("[prefix]")
  .action((tool: string, prefix: string | undefined, _options: unknown, command: Command) =>
    run(() =>
      completeCommand({ kind: "params", tool }, prefix, globalsOf(command), defaultDeps())
    )
  );

program.addCommand(complete, { hidden: true });

await program.parseAsync();
