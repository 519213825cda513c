import { Clock, type FrameClock } from "./Clock.ts";
import { ConsoleLogger, type Logger } from "./Logger.ts";
import {
  evaluateCurve,
  lerpUnclamped,
  type Curve,
  type EasingShape,
} from "./curves.ts";

/**
 * What happens when elapsed time passes the duration.
 *
 * - `none`: finish and hold the end value
 * - `reset`: restart from the start value
 * - `pingPong`: swap the endpoints and run back, forever
 * - `pingPongOnce`: swap the endpoints once, then finish at the next overflow
 */
export type LoopMode = "none" | "reset" | "pingPong" | "pingPongOnce";

export type PlayState = "unplayed" | "playing" | "finished";

export interface EasingOptions {
  /** Seconds for one pass. Defaults to 1. */
  duration?: number;
  /** Read the scaled clock. Defaults to true. */
  scaledTime?: boolean;
  /** Defaults to the global `Clock`. */
  clock?: FrameClock;
  logger?: Logger;
}

/**
 * Interpolates a value from a start to an end over time.
 *
 * Until `begin()` is called `sample()` returns the start value. Once the
 * duration has passed it returns the end value, unless a loop mode restarts
 * it. `sample()` reads the frame clock, so call it at most once per frame.
 *
 * ```ts
 * const fade = new Easing("quadOut", "none", { duration: 0.5 });
 * fade.begin(1, 0);
 * // every frame:
 * sprite.alpha = fade.sample();
 * ```
 */
export class Easing {
  shape: EasingShape | null;
  loop: LoopMode;
  curve: Curve | null = null;
  scaledTime: boolean;
  /** While set, each `sample()` holds progress where it is. */
  paused = false;

  private _playState: PlayState = "unplayed";
  private _startTime = -Infinity;
  private _duration = 1;
  private _startValue = 0;
  private _endValue = 1;

  private readonly _clock: FrameClock;
  private readonly _l: Logger;

  constructor(
    shape: EasingShape | Curve | null,
    loop: LoopMode = "none",
    opts: EasingOptions = {}
  ) {
    if (shape !== null && typeof shape === "object") {
      this.curve = shape;
      this.shape = "curve";
    } else {
      this.shape = shape;
    }
    this.loop = loop;
    this.scaledTime = opts.scaledTime ?? true;
    this._clock = opts.clock ?? Clock;
    this._l = (opts.logger ?? new ConsoleLogger()).child({ component: "Easing" });

    if (opts.duration !== undefined) {
      this.duration = opts.duration;
    }
  }

  get playState(): PlayState {
    return this._playState;
  }

  get startValue(): number {
    return this._startValue;
  }

  get endValue(): number {
    return this._endValue;
  }

  get duration(): number {
    return this._duration;
  }

  set duration(value: number) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(`Easing duration must be a positive number of seconds, got ${value}`);
    }
    this._duration = value;
  }

  /** Starts (or restarts) the transition from `startValue` to `endValue`. */
  begin(startValue: number, endValue: number, duration?: number): void {
    if (duration !== undefined && Number.isFinite(duration)) {
      this.duration = duration;
    }

    this._playState = "playing";
    this._startTime = this._now();
    this._startValue = startValue;
    this._endValue = endValue;

    if (this.shape === null) {
      this._l.error("Easing shape not yet assigned");
    }
  }

  /** Transitions from 0 to 1, for callers that apply the factor themselves. */
  beginFactor(duration?: number): void {
    this.begin(0, 1, duration);
  }

  reset(): void {
    this._playState = "unplayed";
    this._startTime = -Infinity;
  }

  sample(): number {
    if (this.paused) {
      this._startTime += this._clock.deltaTime(this.scaledTime);
    }

    switch (this._playState) {
      case "unplayed":
        return this._startValue;
      case "finished":
        return this._endValue;
      case "playing":
        break;
    }

    let t = this._timeFactor();
    if (t > 1) {
      if (this.loop === "none") {
        this._playState = "finished";
        return this._endValue;
      }

      while (t > 1) {
        this._startTime += this._duration;
        t = this._timeFactor();
        this._applyLoop();
      }
    }

    return this.valueAt(t);
  }

  /** The value at progress `t`, using the current endpoints. */
  valueAt(t: number): number {
    const progress = evaluateCurve(this.shape, t, {
      curve: this.curve,
      logger: this._l,
    });
    return lerpUnclamped(this._startValue, this._endValue, progress);
  }

  private _applyLoop(): void {
    switch (this.loop) {
      case "none":
      case "reset":
        break;
      case "pingPongOnce":
        this.loop = "none";
        this._swapEndpoints();
        break;
      case "pingPong":
        this._swapEndpoints();
        break;
    }
  }

  private _swapEndpoints(): void {
    const tmp = this._endValue;
    this._endValue = this._startValue;
    this._startValue = tmp;
  }

  private _timeFactor(): number {
    return (this._now() - this._startTime) / this._duration;
  }

  private _now(): number {
    return this._clock.time(this.scaledTime);
  }
}
