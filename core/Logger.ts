type Props = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, props?: Props): void;
  info(msg: string, props?: Props): void;
  warn(msg: string, props?: Props): void;
  error(msg: string, props?: Props): void;
  child(props: Props): Logger;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly props: Props | null = null) {}

  debug(msg: string, props: Props = {}) {
    console.debug("DEBUG", msg, { ...this.props, ...props });
  }

  info(msg: string, props: Props = {}) {
    console.info("INFO", msg, { ...this.props, ...props });
  }

  warn(msg: string, props: Props = {}) {
    console.warn("WARN", msg, { ...this.props, ...props });
  }

  error(msg: string, props: Props = {}) {
    console.error("ERROR", msg, { ...this.props, ...props });
  }

  child(props: Props): Logger {
    return new ConsoleLogger({ ...this.props, ...props });
  }
}

export class NoopLogger implements Logger {
  debug() {}
  info() {}
  warn() {}
  error() {}
  child(): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  props: Props;
}

/** Keeps every entry in memory. Children share the parent's entries. */
export class RecordingLogger implements Logger {
  constructor(
    private readonly _entries: LogEntry[] = [],
    private readonly _props: Props = {}
  ) {}

  entries(): readonly LogEntry[] {
    return [...this._entries];
  }

  messages(level?: LogLevel): string[] {
    return this._entries
      .filter((e) => level === undefined || e.level === level)
      .map((e) => e.message);
  }

  clear(): void {
    this._entries.length = 0;
  }

  debug(msg: string, props?: Props): void {
    this._push("debug", msg, props);
  }
  info(msg: string, props?: Props): void {
    this._push("info", msg, props);
  }
  warn(msg: string, props?: Props): void {
    this._push("warn", msg, props);
  }
  error(msg: string, props?: Props): void {
    this._push("error", msg, props);
  }
  child(props: Props): Logger {
    return new RecordingLogger(this._entries, { ...this._props, ...props });
  }

  private _push(level: LogLevel, message: string, props?: Props): void {
    this._entries.push({ level, message, props: { ...this._props, ...props } });
  }
}
