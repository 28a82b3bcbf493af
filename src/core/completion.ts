import type { CacheData, ConnectionConfig, ToolRecord } from "./types.js";
import type { MetadataCache } from "./cache.js";
import { readCache } from "./loader.js";
import { createSession, fetchServerData, type TransportFactory } from "./session.js";
import { extractToolSchema } from "./schema.js";
import { errorMessage } from "./errors.js";
import { COMPLETION_TIMEOUT_MS } from "../utils/constants.js";
import type { Logger } from "../utils/logger.js";

export interface CompletionDeps {
  cache: MetadataCache;
  logger: Logger;
  timeoutMs?: number;
  transportFactory?: TransportFactory;
}

export interface CompletionResult {
  candidates: string[];
  /**
   * Cache write started after a live query, or null when the answer came
   * from the cache. Callers may leave it running; it never rejects.
   */
  refresh: Promise<void> | null;
}

/**
 * Tool names for shell completion. Served from the cache when present,
 * otherwise from a deadline-bound live query. Never throws.
 */
export async function completeToolNames(
  connection: ConnectionConfig,
  deps: CompletionDeps,
  prefix = ""
): Promise<CompletionResult> {
  const cached = await readCache(deps.cache, deps.logger);
  if (cached) {
    return { candidates: toolNames(cached.tools, prefix), refresh: null };
  }

  const live = await queryLive(connection, deps);
  if (!live) return { candidates: [], refresh: null };

  return {
    candidates: toolNames(live.data.tools, prefix),
    refresh: live.refresh,
  };
}

/**
 * `name=` candidates for one tool's parameters, same sourcing as
 * {@link completeToolNames}. A tool absent from the cache triggers a live query.
 */
export async function completeParameterNames(
  connection: ConnectionConfig,
  toolName: string,
  deps: CompletionDeps,
  prefix = ""
): Promise<CompletionResult> {
  const cached = await readCache(deps.cache, deps.logger);
  const cachedTool = cached?.tools.find((t) => t.name === toolName);
  if (cachedTool) {
    return { candidates: parameterNames(cachedTool, prefix, deps.logger), refresh: null };
  }

  const live = await queryLive(connection, deps);
  const tool = live?.data.tools.find((t) => t.name === toolName);
  return {
    candidates: tool ? parameterNames(tool, prefix, deps.logger) : [],
    refresh: live?.refresh ?? null,
  };
}

/**
 * Save a private copy of `data` without blocking the caller. Failure is only
 * logged; the next run simply finds no (or an older) cache entry.
 */
export function scheduleBackgroundSave(
  cache: MetadataCache,
  data: CacheData,
  logger: Logger
): Promise<void> {
  const snapshot = structuredClone(data);
  return cache.save(snapshot).catch((err: unknown) => {
    logger.debug(`Background cache refresh failed: ${errorMessage(err)}`);
  });
}

async function queryLive(
  connection: ConnectionConfig,
  deps: CompletionDeps
): Promise<{ data: CacheData; refresh: Promise<void> } | null> {
  const timeoutMs = deps.timeoutMs ?? COMPLETION_TIMEOUT_MS;

  try {
    const session = await createSession(connection, {
      timeoutMs,
      transportFactory: deps.transportFactory,
    });
    try {
      const data = await fetchServerData(session);
      return { data, refresh: scheduleBackgroundSave(deps.cache, data, deps.logger) };
    } finally {
      await session.close();
    }
  } catch (err) {
    deps.logger.debug(`Completion query failed: ${errorMessage(err)}`);
    return null;
  }
}

function toolNames(tools: readonly ToolRecord[], prefix: string): string[] {
  return tools.map((t) => t.name).filter((name) => name.startsWith(prefix));
}

function parameterNames(tool: ToolRecord, prefix: string, logger: Logger): string[] {
  try {
    const schema = extractToolSchema(tool.inputSchema);
    return Object.keys(schema.parameters)
      .sort()
      .map((name) => name + "=")
      .filter((candidate) => candidate.startsWith(prefix));
  } catch (err) {
    logger.debug(`Unusable schema for ${tool.name}: ${errorMessage(err)}`);
    return [];
  }
}
