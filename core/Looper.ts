import type { ManualClock } from "./ManualClock.ts";

export interface Looper {
  /** Calls `cb` once per frame, after the clock has advanced. Returns a stop function. */
  loop(cb: (frame: number) => void): () => void;
}

/** Steps a `ManualClock` by a fixed amount each `tick()`. */
export class ManualLooper implements Looper {
  private _instances = new Set<ManualLooperInstance>();

  constructor(
    public readonly clock: ManualClock,
    public readonly stepSeconds: number
  ) {}

  loop(cb: (frame: number) => void): () => void {
    const instance = new ManualLooperInstance(cb);
    this._instances.add(instance);
    return () => {
      this._instances.delete(instance);
    };
  }

  tick() {
    this.clock.advance(this.stepSeconds);
    this._instances.forEach((instance) => instance.tick());
  }
}

class ManualLooperInstance {
  private _frame = 0;

  constructor(private _cb: (frame: number) => void) {}

  tick() {
    this._cb(this._frame++);
  }
}
