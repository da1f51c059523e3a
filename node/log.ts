import { Console } from "node:console";
import { once } from "node:events";
import { createWriteStream } from "node:fs";
import type { Writable } from "node:stream";
import { ConfigError, errorMessage } from "./errors.js";

export interface Logger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

const pad = (n: number) => String(n).padStart(2, "0");

export function timestamp(date: Date) {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class ConsoleLogger implements Logger {
  private console: Console;

  constructor(
    private out: Writable = process.stdout,
    private now: () => Date = () => new Date()
  ) {
    this.console = new Console({ stdout: out, stderr: out });
  }

  info(message: string) {
    this.console.log(`${timestamp(this.now())} ${message}`);
  }

  error(message: string, err?: unknown) {
    const detail = err === undefined ? "" : `: ${errorMessage(err)}`;
    this.console.error(`${timestamp(this.now())} ${message}${detail}`);
  }

  close(callback?: () => void) {
    if (this.out === process.stdout) {
      callback?.();
      return;
    }
    this.out.end(callback);
  }
}

/**
 * Appends to `logFile` when given, otherwise writes to stdout. The file
 * is opened before this resolves; a file that cannot be opened is a
 * ConfigError.
 */
export async function createLogger(logFile?: string) {
  if (!logFile) return new ConsoleLogger();
  const stream = createWriteStream(logFile, { flags: "a" });
  try {
    await once(stream, "open");
  } catch (err) {
    throw new ConfigError(
      `cannot open log file ${logFile}: ${errorMessage(err)}`
    );
  }
  return new ConsoleLogger(stream);
}
