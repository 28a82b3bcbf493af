import type { ConnectionConfig } from "../core/types.js";
import { FileCache, getCacheDir } from "../core/cache.js";
import type { TransportFactory } from "../core/session.js";
import { discoverConfig } from "../parsers/config-discovery.js";
import { resolveConnection, type ConnectionFlags } from "../parsers/connection.js";
import { ConfigError, UsageError, errorMessage } from "../core/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { EXIT_FAILURE, EXIT_USAGE } from "../utils/constants.js";

/** Options defined on the root program and shared by every command. */
export type GlobalOptions = ConnectionFlags & {
  config?: string;
  color: boolean;
  verbose?: boolean;
};

/**
 * Seams for tests and embedding: output sink, environment and transports.
 */
export interface CommandDeps {
  out: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Show spinners on stderr */
  interactive: boolean;
  cacheDir?: string;
  transportFactory?: TransportFactory;
  logger?: Logger;
}

export interface CommandContext {
  logger: Logger;
  connection: ConnectionConfig;
  timeoutMs: number;
  cache: FileCache;
  deps: CommandDeps;
}

export function defaultDeps(overrides: Partial<CommandDeps> = {}): CommandDeps {
  return {
    out: (line) => process.stdout.write(line + "\n"),
    env: process.env,
    cwd: process.cwd(),
    interactive: Boolean(process.stderr.isTTY),
    ...overrides,
  };
}

export function commandLogger(globals: GlobalOptions, deps: CommandDeps): Logger {
  return (
    deps.logger ??
    createLogger({
      color: globals.color && !deps.env.NO_COLOR,
      verbose: globals.verbose ?? false,
    })
  );
}

export function cacheDirFor(deps: CommandDeps): string {
  return deps.cacheDir ?? getCacheDir(deps.env);
}

/**
 * Resolve config, connection and cache for a server command. Throws
 * UsageError or ConfigError when the options do not name a server.
 */
export function buildContext(globals: GlobalOptions, deps: CommandDeps): CommandContext {
  const logger = commandLogger(globals, deps);
  const config = discoverConfig(globals.config, deps.cwd, deps.env);
  if (config) logger.debug(`Using config ${config.configPath}`);

  const { connection, timeoutMs } = resolveConnection(globals, config, deps.env);
  const cache = new FileCache(connection, { cacheDir: cacheDirFor(deps), logger });

  return { logger, connection, timeoutMs, cache, deps };
}

/**
 * Log a command failure and pick the exit code: usage and config problems
 * exit 2, everything else 1.
 */
export function reportFailure(err: unknown, logger: Logger): number {
  logger.error(errorMessage(err));
  if (err instanceof UsageError || err instanceof ConfigError) return EXIT_USAGE;
  return EXIT_FAILURE;
}
