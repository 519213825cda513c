import {
  Easing,
  ManualClock,
  ManualLooper,
  type EasingShape,
  type Logger,
  type LoopMode,
  type RngRegistry,
} from "../core/index.ts";

export interface PlotOptions {
  shape: EasingShape;
  loop: LoopMode;
  duration: number;
  from: number;
  to: number;
  fps: number;
  frames: number;
  timeScale: number;
  /** Frames in [start, end) during which the easing is paused */
  pause?: [number, number];
}

/** Runs an easing on a simulated clock and returns one `time value` line per frame. */
export function plotEasing(opts: PlotOptions, logger: Logger): string[] {
  const clock = new ManualClock();
  clock.timeScale = opts.timeScale;
  const looper = new ManualLooper(clock, 1 / opts.fps);
  const easing = new Easing(opts.shape, opts.loop, {
    duration: opts.duration,
    clock,
    logger,
  });

  const lines: string[] = [];
  easing.begin(opts.from, opts.to);
  const stop = looper.loop((frame) => {
    if (opts.pause) {
      easing.paused = frame >= opts.pause[0] && frame < opts.pause[1];
    }
    const value = easing.sample();
    lines.push(`${clock.time(true).toFixed(3)} ${value.toFixed(4)}`);
  });
  for (let i = 0; i < opts.frames; i++) {
    looper.tick();
  }
  stop();

  logger.debug("plotted easing", { shape: opts.shape, playState: easing.playState });
  return lines;
}

/** Draws `count` integers in [min, max) from a channel, one per line. */
export function drawChannel<C extends string>(
  registry: RngRegistry<C>,
  channel: C,
  count: number,
  min: number,
  max: number
): string[] {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    lines.push(String(registry.rangeInt(channel, min, max)));
  }
  return lines;
}
