import chalk from "chalk";

export interface LoggerOptions {
  /** Colorize the symbol prefixes */
  color: boolean;
  /** Print debug lines */
  verbose: boolean;
  /** Line sink, stderr by default so stdout only carries command output */
  write?: (line: string) => void;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
  dim(msg: string): void;
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const colorize = (fn: (s: string) => string, text: string): string =>
    options.color ? fn(text) : text;

  return {
    info: (msg) => write(colorize(chalk.blue, "ℹ") + " " + msg),
    success: (msg) => write(colorize(chalk.green, "✓") + " " + msg),
    warn: (msg) => write(colorize(chalk.yellow, "⚠") + " " + msg),
    error: (msg) => write(colorize(chalk.red, "✗") + " " + msg),
    debug: (msg) => {
      if (options.verbose) write(colorize(chalk.dim, "· " + msg));
    },
    dim: (msg) => write(colorize(chalk.dim, msg)),
  };
}

/** A logger that drops everything, for library callers that pass none. */
export const silentLogger: Logger = createLogger({
  color: false,
  verbose: false,
  write: () => {},
});
