import chalk from "chalk";
import fs from "node:fs";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

let verbose = false;
let jsonMode = false;
let logFile: string | undefined;

export function setVerbose(v: boolean): void { verbose = v; }
export function setJsonMode(v: boolean): void { jsonMode = v; }
export function setLogFile(path: string | undefined): void { logFile = path; }

// A log file that cannot be appended to is dropped after one warning on
// stderr. Logging never throws into the caller.
function appendToFile(line: string): void {
  if (!logFile) return;
  try {
    fs.appendFileSync(logFile, line + "\n");
  } catch (err) {
    const failed = logFile;
    logFile = undefined;
    const reason = err instanceof Error ? err.message : String(err);
    console.error(chalk.yellow("warn"), `log file ${failed} disabled: ${reason}`);
  }
}

function write(level: LogLevel, color: (s: string) => string, msg: string): void {
  if (jsonMode) {
    const line = JSON.stringify({ level, ts: Date.now(), msg });
    console.error(line);
    appendToFile(line);
  } else {
    console.error(color(level), msg);
    appendToFile(`${level} ${msg}`);
  }
}

export const log = {
  trace(msg: string): void { if (verbose) write("trace", chalk.dim, msg); },
  debug(msg: string): void { if (verbose) write("debug", chalk.gray, msg); },
  info(msg: string): void { write("info", chalk.blue, msg); },
  warn(msg: string): void { write("warn", chalk.yellow, msg); },
  error(msg: string): void { write("error", chalk.red, msg); },
};

// Applies the `logging` section of a loaded config.
export function configureLogger(opts: { verbose?: boolean; json?: boolean; file?: string }): void {
  setVerbose(opts.verbose ?? false);
  setJsonMode(opts.json ?? false);
  setLogFile(opts.file);
}
