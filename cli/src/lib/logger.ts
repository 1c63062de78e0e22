export interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
}

export class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  get jsonMode(): boolean {
    return Boolean(this.options.json);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet || this.options.json) return;
    console.log(message);
    if (data) {
      console.dir(data, { depth: null, colors: true });
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;

    if (this.options.json) {
      console.warn(JSON.stringify({ level: "warn", message, ...data }));
    } else {
      console.warn(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  /**
   * Errors are always displayed regardless of quiet mode.
   */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message } : error === undefined ? {} : { error };
      console.error(JSON.stringify({ level: "error", message, ...errorData }));
      return;
    }
    console.error(message);
    if (error instanceof Error) {
      console.error(error.message);
    } else if (error !== undefined) {
      console.dir(error, { depth: null, colors: true });
    }
  }

  /** Machine-readable command output; printed only in JSON mode, even when quiet. */
  result(data: unknown): void {
    if (!this.options.json) return;
    console.log(JSON.stringify(data, null, 2));
  }

  section(title: string): void {
    this.info(`\n=== ${title} ===`);
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }
}

export const logger = new Logger();
