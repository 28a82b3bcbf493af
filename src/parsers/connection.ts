import type { ConnectionConfig } from "../core/types.js";
import type { InvokeConfig, ServerProfile } from "./types.js";
import { UsageError } from "../core/errors.js";
import { DEFAULT_CLIENT_NAME, DEFAULT_TIMEOUT_MS, TOKEN_ENV_VAR } from "../utils/constants.js";

/** Global command-line options that describe the connection. */
export type ConnectionFlags = {
  sse?: string;
  http?: string;
  server?: string;
  proxy?: string;
  token?: string;
  name?: string;
  timeout?: string;
};

export interface ResolvedConnection {
  connection: ConnectionConfig;
  timeoutMs: number;
}

/**
 * Merge flags, the selected profile, config defaults and the environment.
 * Flags win over the profile, the profile over defaults.
 */
export function resolveConnection(
  flags: ConnectionFlags,
  config: InvokeConfig | null,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConnection {
  if (flags.sse && flags.http) {
    throw new UsageError("cannot specify both --sse and --http flags");
  }

  const profile = flags.server ? findProfile(flags.server, config) : undefined;
  const defaults = config?.defaults ?? {};

  let serverUrl: string;
  let transport: string;
  if (flags.sse) {
    serverUrl = flags.sse;
    transport = "sse";
  } else if (flags.http) {
    serverUrl = flags.http;
    transport = "http";
  } else if (profile) {
    serverUrl = profile.url;
    transport = profile.transport;
  } else {
    throw new UsageError("must specify either --sse=<url> or --http=<url>");
  }

  const token = flags.token ?? profile?.token ?? defaults.token ?? env[TOKEN_ENV_VAR];

  return {
    connection: {
      serverUrl,
      transport,
      token: token || undefined,
      proxy: flags.proxy ?? profile?.proxy ?? defaults.proxy,
      clientName: flags.name ?? profile?.name ?? defaults.name ?? DEFAULT_CLIENT_NAME,
    },
    timeoutMs: parseTimeout(flags.timeout) ?? defaults.timeout ?? DEFAULT_TIMEOUT_MS,
  };
}

function findProfile(name: string, config: InvokeConfig | null): ServerProfile {
  if (!config) {
    throw new UsageError(`unknown server profile "${name}" (no config file found)`);
  }
  const profile = Object.hasOwn(config.servers, name) ? config.servers[name] : undefined;
  if (!profile) {
    const known = Object.keys(config.servers);
    throw new UsageError(
      `unknown server profile "${name}"` +
        (known.length > 0 ? `, available: ${known.join(", ")}` : "")
    );
  }
  return profile;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = parseInt(value, 10);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new UsageError(`invalid timeout "${value}", expected milliseconds`);
  }
  return ms;
}
