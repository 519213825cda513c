import { PlatformFrameClock } from "./platform/PlatformFrameClock.ts";

/**
 * A per-frame clock. Readings are constant within a frame and advance when the
 * host starts the next one.
 *
 * Scaled readings follow the host's time scale (slow motion, pause menus);
 * unscaled readings follow real time.
 */
export interface FrameClock {
  /** Seconds since the clock started, as of the start of the current frame */
  time(scaled: boolean): number;

  /** Seconds between the start of the previous frame and the current one */
  deltaTime(scaled: boolean): number;
}

export const Clock = {
  time(scaled: boolean): number {
    return global.time(scaled);
  },

  deltaTime(scaled: boolean): number {
    return global.deltaTime(scaled);
  },

  /**
   * Makes `clock` the global clock and returns the one it replaces. Hosts that
   * tick their own clock install it here before any `Easing` reads the time.
   */
  use(clock: FrameClock): FrameClock {
    const prev = global;
    global = clock;
    return prev;
  },

  __debugGetGlobal(): FrameClock {
    return global;
  },

  __debugSetGlobal(clock: FrameClock) {
    global = clock;
  },
};

/**
 * The platform clock installed as the global `Clock` until `Clock.use` swaps
 * it. Nothing ticks it on its own: hand it to an `IntervalLooper`.
 */
export const defaultFrameClock = new PlatformFrameClock();

let global: FrameClock = defaultFrameClock;
