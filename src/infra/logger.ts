import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives one formatted line without the trailing newline */
export type LogSink = (line: string) => void;

interface LoggerOptions {
  level: LogLevel;
  verbose: boolean;
  sink: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLES: Record<LogLevel, { label: string; paint: (text: string) => string }> = {
  debug: { label: "DEBUG", paint: pc.gray },
  info: { label: "INFO", paint: pc.cyan },
  warn: { label: "WARN", paint: pc.yellow },
  error: { label: "ERROR", paint: pc.red },
};

// stdout is reserved for command output such as --json
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function timestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

/**
 * Leveled stderr logger. Scoped children share the root's settings, so
 * `configure` on any of them applies everywhere.
 */
export class Logger {
  constructor(
    private readonly options: LoggerOptions = { level: "info", verbose: false, sink: stderrSink },
    private readonly scope?: string
  ) {}

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.options.level = options.level;
    }
    if (options.verbose !== undefined) {
      this.options.verbose = options.verbose;
    }
    if (options.sink !== undefined) {
      this.options.sink = options.sink;
    }
  }

  child(scope: string): Logger {
    return new Logger(this.options, this.scope ? `${this.scope}:${scope}` : scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.options.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  /** `data` is only shown in verbose mode */
  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, this.options.verbose ? data : undefined);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.emit("error", message);
    if (error instanceof Error && this.options.verbose) {
      this.options.sink(pc.red(error.stack ?? error.message));
    }
  }

  success(message: string): void {
    if (!this.isEnabled("info")) return;
    this.options.sink(`${pc.green(`[${timestamp()}]`)} ${pc.green("✓")} ${this.scoped(message)}`);
  }

  header(text: string): void {
    this.options.sink("");
    this.options.sink(pc.bold(pc.cyan(`═══ ${text} ═══`)));
    this.options.sink("");
  }

  step(step: number, total: number, message: string): void {
    if (!this.isEnabled("info")) return;
    this.options.sink(`${pc.dim(`[${step}/${total}]`)} ${this.scoped(message)}`);
  }

  private scoped(message: string): string {
    return this.scope ? `${pc.dim(`[${this.scope}]`)} ${message}` : message;
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { label, paint } = LEVEL_STYLES[level];
    let line = `${paint(`[${timestamp()}] ${label}`)} ${this.scoped(message)}`;
    if (data) {
      line += ` ${pc.gray(JSON.stringify(data))}`;
    }
    this.options.sink(line);
  }
}

export const logger = new Logger();
