import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { extname, join, resolve } from "node:path";
import { parse as parseJsonc } from "jsonc-parser";
import yaml from "js-yaml";
import type {
  ConfigLocation,
  InvokeConfig,
  ProfileDefaults,
  ProfileTransport,
  ServerProfile,
} from "./types.js";
import { ConfigError } from "../core/errors.js";
import { isRecord } from "../core/schema.js";
import { APP_NAME } from "../utils/constants.js";

/**
 * Candidate config file locations, project-local first.
 */
function getConfigLocations(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ConfigLocation[] {
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  const paths = [
    join(cwd, `.${APP_NAME}.json`),
    join(cwd, `.${APP_NAME}.yaml`),
    join(cwd, `.${APP_NAME}.yml`),
    join(configHome, APP_NAME, "config.json"),
    join(configHome, APP_NAME, "config.yaml"),
  ];

  return paths.map((path) => ({ path, exists: existsSync(path) }));
}

/**
 * Load the explicit config file, or the first discovered one that parses.
 * Returns null when there is none; an explicit path that cannot be used is
 * an error.
 */
export function discoverConfig(
  explicitPath?: string,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): InvokeConfig | null {
  if (explicitPath) {
    const path = resolve(cwd, explicitPath);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
    const config = parseConfigFile(path);
    if (!config) {
      throw new ConfigError(`Invalid config file: ${explicitPath}`);
    }
    return config;
  }

  for (const loc of getConfigLocations(cwd, env)) {
    if (!loc.exists) continue;
    const config = parseConfigFile(loc.path);
    if (config) return config;
  }

  return null;
}

/**
 * Parse a config file. JSON files may carry comments; `.yaml`/`.yml` files
 * are read as YAML.
 */
function parseConfigFile(configPath: string): InvokeConfig | null {
  let parsed: unknown;
  try {
    const raw = readFileSync(configPath, "utf-8");
    const ext = extname(configPath).toLowerCase();
    parsed = ext === ".yaml" || ext === ".yml" ? yaml.load(raw) : parseJsonc(raw);
  } catch {
    return null;
  }

  if (!isRecord(parsed)) return null;

  // Either our own { "servers": { ... } } or an MCP client's { "mcpServers": { ... } }
  const rawServers: Record<string, unknown> = isRecord(parsed.servers)
    ? parsed.servers
    : isRecord(parsed.mcpServers)
      ? parsed.mcpServers
      : {};

  return {
    configPath,
    defaults: normalizeDefaults(parsed.defaults),
    servers: normalizeServers(rawServers),
  };
}

function normalizeDefaults(raw: unknown): ProfileDefaults {
  if (!isRecord(raw)) return {};
  return {
    token: typeof raw.token === "string" ? raw.token : undefined,
    proxy: typeof raw.proxy === "string" ? raw.proxy : undefined,
    name: typeof raw.name === "string" ? raw.name : undefined,
    timeout:
      typeof raw.timeout === "number" && raw.timeout > 0 ? raw.timeout : undefined,
  };
}

/**
 * Keep the entries that describe a remote server. Command-based (stdio)
 * entries have no URL and are skipped.
 */
function normalizeServers(raw: Record<string, unknown>): Record<string, ServerProfile> {
  const servers: Record<string, ServerProfile> = {};

  for (const [name, value] of Object.entries(raw)) {
    if (!isRecord(value) || typeof value.url !== "string") continue;

    servers[name] = {
      url: value.url,
      transport: inferTransport(value),
      token: typeof value.token === "string" ? value.token : undefined,
      proxy: typeof value.proxy === "string" ? value.proxy : undefined,
      name: typeof value.name === "string" ? value.name : undefined,
    };
  }

  return servers;
}

function inferTransport(config: Record<string, unknown>): ProfileTransport {
  const declared = config.transport ?? config.type;
  if (declared === "sse") return "sse";
  if (declared === "http" || declared === "streamable-http" || declared === "streamable") {
    return "http";
  }
  return typeof config.url === "string" && /\/sse\/?$/.test(config.url) ? "sse" : "http";
}
