import type { Logger } from "@townsim/schemas";

export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(scope: string) {
    // Agent names come from snapshot files; keep control characters out of log lines
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[${safeScope}]`;
  }

  /** Logger for a sub-scope, e.g. `agent` → `agent:Isabella`. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix.slice(1, -1)}:${scope}`);
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}
