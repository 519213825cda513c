import type { FrameClock } from "../Clock.ts";

/**
 * Real-time frame clock. Call `tick()` once at the start of every frame.
 *
 * `now` returns milliseconds and defaults to `performance.now()`.
 */
export class PlatformFrameClock implements FrameClock {
  private _timeScale = 1;
  private _last: number;
  private _time = 0;
  private _scaledTime = 0;
  private _delta = 0;
  private _scaledDelta = 0;

  constructor(private readonly now: () => number = () => performance.now()) {
    this._last = now();
  }

  get timeScale(): number {
    return this._timeScale;
  }

  set timeScale(value: number) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`timeScale must be a non-negative number, got ${value}`);
    }
    this._timeScale = value;
  }

  tick(): void {
    const now = this.now();
    this._delta = Math.max(0, now - this._last) / 1000;
    this._last = now;
    this._scaledDelta = this._delta * this._timeScale;
    this._time += this._delta;
    this._scaledTime += this._scaledDelta;
  }

  time(scaled: boolean): number {
    return scaled ? this._scaledTime : this._time;
  }

  deltaTime(scaled: boolean): number {
    return scaled ? this._scaledDelta : this._delta;
  }
}
