import type { CacheData, ConnectionConfig } from "./types.js";
import type { MetadataCache } from "./cache.js";
import {
  createSession,
  fetchServerData,
  type ServerSession,
  type SessionOptions,
} from "./session.js";
import { TransportError, errorMessage } from "./errors.js";
import type { Logger } from "../utils/logger.js";

export interface LoaderDeps {
  cache: MetadataCache;
  logger: Logger;
  session?: SessionOptions;
}

/**
 * Read whatever the cache holds. Load failures count as a miss.
 */
export async function readCache(cache: MetadataCache, logger: Logger): Promise<CacheData | null> {
  try {
    const { data } = await cache.load();
    return data;
  } catch (err) {
    logger.debug(`Cache unavailable: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Persist a snapshot; the cache is an optimization, so failures only warn.
 */
export async function writeCache(
  cache: MetadataCache,
  data: CacheData,
  logger: Logger
): Promise<void> {
  try {
    await cache.save(data);
  } catch (err) {
    logger.warn(`Could not update cache: ${errorMessage(err)}`);
  }
}

/**
 * Fetch the server's metadata, refreshing the cache on success and falling
 * back to the cached snapshot when the server cannot be reached.
 */
export async function loadServerData(
  connection: ConnectionConfig,
  deps: LoaderDeps
): Promise<CacheData> {
  const cached = await readCache(deps.cache, deps.logger);

  let session: ServerSession;
  try {
    session = await createSession(connection, deps.session);
  } catch (err) {
    if (cached) {
      deps.logger.warn("Using cached data (server unavailable)");
      deps.logger.debug(errorMessage(err));
      return cached;
    }
    throw new TransportError(`create session: ${errorMessage(err)}`, err);
  }

  try {
    const fresh = await fetchServerData(session);
    await writeCache(deps.cache, fresh, deps.logger);
    return fresh;
  } finally {
    await session.close();
  }
}
