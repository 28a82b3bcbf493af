import { createHash } from "node:crypto";
import { CACHE_KEY_LENGTH, HASH_ALGORITHM } from "./constants.js";

/**
 * Derive the cache key for a connection.
 *
 * The four inputs are fed to the digest in order with no separator, so the key
 * changes whenever any one of them changes.
 */
export function cacheKey(
  serverUrl: string,
  transport: string,
  token: string,
  clientName: string
): string {
  return createHash(HASH_ALGORITHM)
    .update(serverUrl)
    .update(transport)
    .update(token)
    .update(clientName)
    .digest("hex")
    .slice(0, CACHE_KEY_LENGTH);
}
