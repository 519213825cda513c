import { NoopLogger, RecordingLogger, type Logger } from "./Logger.ts";
import { Random, type RandomSource } from "./Random/Random.ts";

export function testLogger(): RecordingLogger {
  return new RecordingLogger();
}

export function noopLogger(): Logger {
  return new NoopLogger();
}

/** A source that returns the given outputs in order, then repeats the last. */
export function scriptedSource(outputs: number[]): RandomSource {
  let i = 0;
  return {
    next32: () => outputs[Math.min(i++, outputs.length - 1)],
  };
}

export function zeroRandom(): Random {
  return new Random(scriptedSource([0]));
}
