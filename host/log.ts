import { pino, type DestinationStream, type Logger as PinoBaseLogger } from "pino";
import type { Logger as ILogger, LogLevel } from "../core/index.ts";

type Props = Record<string, unknown>;

export class PinoLogger implements ILogger {
  constructor(private readonly inner: PinoBaseLogger) {}

  debug(msg: string, props: Props = {}): void {
    this.inner.debug(props, msg);
  }
  info(msg: string, props: Props = {}): void {
    this.inner.info(props, msg);
  }
  warn(msg: string, props: Props = {}): void {
    this.inner.warn(props, msg);
  }
  error(msg: string, props: Props = {}): void {
    this.inner.error(props, msg);
  }
  child(props: Props): ILogger {
    return new PinoLogger(this.inner.child(props));
  }
}

/** JSON lines to stderr, or to `destination` when given. */
export function setupLogs(level: LogLevel, destination?: DestinationStream): PinoLogger {
  return new PinoLogger(
    pino({ level, base: null }, destination ?? pino.destination(2))
  );
}
