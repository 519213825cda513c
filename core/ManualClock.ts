import type { FrameClock } from "./Clock.ts";

/** A frame clock advanced explicitly, for tools and simulations. */
export class ManualClock implements FrameClock {
  private _timeScale = 1;
  private _time = 0;
  private _scaledTime = 0;
  private _delta = 0;
  private _scaledDelta = 0;

  get timeScale(): number {
    return this._timeScale;
  }

  set timeScale(value: number) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`timeScale must be a non-negative number, got ${value}`);
    }
    this._timeScale = value;
  }

  /** Starts a new frame `seconds` of real time after the previous one. */
  advance(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`cannot advance by ${seconds}s`);
    }
    this._delta = seconds;
    this._scaledDelta = seconds * this._timeScale;
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
