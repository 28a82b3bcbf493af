import { clearAll, getCacheInfo } from "../core/cache.js";
import { formatCacheInfo } from "../reporters/console.js";
import {
  cacheDirFor,
  commandLogger,
  reportFailure,
  type CommandDeps,
  type GlobalOptions,
} from "./context.js";
import { EXIT_OK } from "../utils/constants.js";

export async function cacheClearCommand(
  globals: GlobalOptions,
  deps: CommandDeps
): Promise<number> {
  const logger = commandLogger(globals, deps);
  try {
    const removed = await clearAll(cacheDirFor(deps));
    logger.debug(`Removed ${removed} file(s)`);
    deps.out("Cache cleared successfully");
    return EXIT_OK;
  } catch (err) {
    return reportFailure(err, logger);
  }
}

export async function cacheInfoCommand(
  globals: GlobalOptions,
  deps: CommandDeps
): Promise<number> {
  try {
    const info = await getCacheInfo(cacheDirFor(deps));
    for (const line of formatCacheInfo(info)) deps.out(line);
    return EXIT_OK;
  } catch (err) {
    return reportFailure(err, commandLogger(globals, deps));
  }
}
