import type { Looper } from "../Looper.ts";
import type { PlatformFrameClock } from "./PlatformFrameClock.ts";

export class IntervalLooper implements Looper {
  private _frame = 0;

  constructor(
    public readonly clock: PlatformFrameClock,
    public readonly intervalMs: number
  ) {}

  loop(cb: (frame: number) => void): () => void {
    const id = setInterval(() => {
      this.clock.tick();
      cb(this._frame++);
    }, this.intervalMs);
    return () => clearInterval(id);
  }
}
