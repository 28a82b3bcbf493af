import ora from "ora";
import { loadServerData } from "../core/loader.js";
import { UsageError } from "../core/errors.js";
import { formatListing, isListKind } from "../reporters/console.js";
import {
  buildContext,
  commandLogger,
  reportFailure,
  type CommandDeps,
  type GlobalOptions,
} from "./context.js";
import { EXIT_OK } from "../utils/constants.js";

interface ListOptions {
  json?: boolean;
}

export async function listCommand(
  kind: string | undefined,
  options: ListOptions,
  globals: GlobalOptions,
  deps: CommandDeps
): Promise<number> {
  const listKind = kind ?? "all";

  try {
    if (!isListKind(listKind)) {
      throw new UsageError(
        `unknown list type '${listKind}', supported types: tools, resources, prompts`
      );
    }

    const ctx = buildContext(globals, deps);

    const spinner = ora({
      text: `Connecting to ${ctx.connection.serverUrl}...`,
      isSilent: !deps.interactive || Boolean(options.json),
    }).start();

    const data = await loadServerData(ctx.connection, {
      cache: ctx.cache,
      logger: ctx.logger,
      session: { timeoutMs: ctx.timeoutMs, transportFactory: deps.transportFactory },
    }).finally(() => spinner.stop());

    const lines = formatListing(data, listKind, {
      json: Boolean(options.json),
      color: globals.color && !deps.env.NO_COLOR,
    });
    for (const line of lines) deps.out(line);

    return EXIT_OK;
  } catch (err) {
    return reportFailure(err, commandLogger(globals, deps));
  }
}
