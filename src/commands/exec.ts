import ora from "ora";
import type { ToolSchema } from "../core/types.js";
import { callTool, createSession, getToolSchema, type ServerSession } from "../core/session.js";
import { readCache } from "../core/loader.js";
import { extractToolSchema, isRecord } from "../core/schema.js";
import { parseParamsWithSchema, parseRawParams } from "../core/validator.js";
import { ToolNotFoundError, errorMessage } from "../core/errors.js";
import {
  buildContext,
  commandLogger,
  reportFailure,
  type CommandContext,
  type CommandDeps,
  type GlobalOptions,
} from "./context.js";
import { EXIT_FAILURE, EXIT_OK } from "../utils/constants.js";

interface ExecOptions {
  param: string[];
  /** False with --no-schema: send every value as a string */
  schema: boolean;
  pretty?: boolean;
}

export async function execCommand(
  toolName: string,
  options: ExecOptions,
  globals: GlobalOptions,
  deps: CommandDeps
): Promise<number> {
  let session: ServerSession | undefined;

  try {
    const ctx = buildContext(globals, deps);

    const spinner = ora({
      text: `Connecting to ${ctx.connection.serverUrl}...`,
      isSilent: !deps.interactive,
    }).start();
    try {
      session = await createSession(ctx.connection, {
        timeoutMs: ctx.timeoutMs,
        transportFactory: deps.transportFactory,
      });
    } finally {
      spinner.stop();
    }

    // Conversion and validation failures stop here, before the tool is called
    let args: Record<string, unknown>;
    if (options.schema) {
      const schema = await resolveToolSchema(ctx, session, toolName);
      if (schema) {
        const { params, warnings } = parseParamsWithSchema(options.param, schema);
        for (const warning of warnings) ctx.logger.warn(warning);
        args = params;
      } else {
        ctx.logger.warn("Tool schema unavailable, sending parameters as strings");
        args = parseRawParams(options.param);
      }
    } else {
      args = parseRawParams(options.param);
    }
    ctx.logger.debug(`Calling ${toolName} with ${JSON.stringify(args)}`);

    const result = await callTool(session, toolName, args);
    deps.out(options.pretty ? JSON.stringify(result, null, 2) : JSON.stringify(result));

    return isRecord(result) && result.isError === true ? EXIT_FAILURE : EXIT_OK;
  } catch (err) {
    return reportFailure(err, commandLogger(globals, deps));
  } finally {
    await session?.close();
  }
}

/**
 * The live schema, or the cached one when listing tools fails. A tool the
 * server says it does not have is an error; null means no schema is known.
 */
async function resolveToolSchema(
  ctx: CommandContext,
  session: ServerSession,
  toolName: string
): Promise<ToolSchema | null> {
  try {
    return await getToolSchema(session, toolName);
  } catch (err) {
    if (err instanceof ToolNotFoundError) throw err;
    ctx.logger.debug(`Live schema lookup failed: ${errorMessage(err)}`);
  }

  const cached = await readCache(ctx.cache, ctx.logger);
  const tool = cached?.tools.find((t) => t.name === toolName);
  if (!tool) return null;

  ctx.logger.debug(`Using cached schema for ${toolName}`);
  return extractToolSchema(tool.inputSchema);
}
