import { completeParameterNames, completeToolNames } from "../core/completion.js";
import {
  buildContext,
  commandLogger,
  type CommandContext,
  type CommandDeps,
  type GlobalOptions,
} from "./context.js";
import { COMPLETION_TIMEOUT_MS, EXIT_OK } from "../utils/constants.js";
import { errorMessage } from "../core/errors.js";

export type CompletionTarget = { kind: "tools" } | { kind: "params"; tool: string };

/**
 * Print completion candidates, one per line. Completion must never break the
 * shell, so every failure ends in an empty answer and exit 0.
 */
export async function completeCommand(
  target: CompletionTarget,
  prefix: string | undefined,
  globals: GlobalOptions,
  deps: CommandDeps
): Promise<number> {
  let ctx: CommandContext;
  try {
    ctx = buildContext(globals, deps);
  } catch (err) {
    commandLogger(globals, deps).debug(`No completion: ${errorMessage(err)}`);
    return EXIT_OK;
  }

  const completionDeps = {
    cache: ctx.cache,
    logger: ctx.logger,
    timeoutMs: Math.min(ctx.timeoutMs, COMPLETION_TIMEOUT_MS),
    transportFactory: deps.transportFactory,
  };

  const result =
    target.kind === "tools"
      ? await completeToolNames(ctx.connection, completionDeps, prefix)
      : await completeParameterNames(ctx.connection, target.tool, completionDeps, prefix);

  for (const candidate of result.candidates) deps.out(candidate);

  // The refresh runs detached; the process exits once it settles
  void result.refresh;

  return EXIT_OK;
}
