import type { Curve } from "./curves.ts";

export interface Keyframe {
  time: number;
  value: number;
  /** Slope arriving at this key. Defaults to 0. */
  inTangent?: number;
  /** Slope leaving this key. Defaults to 0. */
  outTangent?: number;
}

/**
 * Piecewise cubic Hermite curve through a list of keyframes. Outside the
 * keyed range the curve holds the first or last value.
 */
export class KeyframeCurve implements Curve {
  private readonly _keys: readonly Keyframe[];

  constructor(keys: readonly Keyframe[]) {
    if (keys.length === 0) {
      throw new Error("KeyframeCurve needs at least one keyframe");
    }
    for (let i = 1; i < keys.length; i++) {
      if (!(keys[i].time > keys[i - 1].time)) {
        throw new Error(
          `keyframe times must be strictly increasing (index ${i}: ${keys[i - 1].time} -> ${keys[i].time})`
        );
      }
    }
    this._keys = keys.map((k) => ({ ...k }));
  }

  static constant(value: number): KeyframeCurve {
    return new KeyframeCurve([{ time: 0, value }]);
  }

  static linear(t0: number, v0: number, t1: number, v1: number): KeyframeCurve {
    const slope = (v1 - v0) / (t1 - t0);
    return new KeyframeCurve([
      { time: t0, value: v0, outTangent: slope },
      { time: t1, value: v1, inTangent: slope },
    ]);
  }

  keys(): readonly Keyframe[] {
    return this._keys;
  }

  evaluate(t: number): number {
    const keys = this._keys;
    const first = keys[0];
    const last = keys[keys.length - 1];
    if (t <= first.time) return first.value;
    if (t >= last.time) return last.value;

    let i = 0;
    while (t >= keys[i + 1].time) i++;
    const a = keys[i];
    const b = keys[i + 1];

    const dt = b.time - a.time;
    const s = (t - a.time) / dt;
    const s2 = s * s;
    const s3 = s2 * s;

    const h00 = 2 * s3 - 3 * s2 + 1;
    const h10 = s3 - 2 * s2 + s;
    const h01 = -2 * s3 + 3 * s2;
    const h11 = s3 - s2;

    return (
      h00 * a.value +
      h10 * dt * (a.outTangent ?? 0) +
      h01 * b.value +
      h11 * dt * (b.inTangent ?? 0)
    );
  }
}
