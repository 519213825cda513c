import type { Logger } from "./Logger.ts";

// Formulas follow the catalogue at <https://easings.net/>, except backInOut
// which uses 2.595 as its overshoot constant.

export const EASING_SHAPES = [
  "linear",
  "startValue",
  "endValue",
  "curve",

  "quadIn",
  "quadOut",
  "quadInOut",

  "cubicIn",
  "cubicOut",
  "cubicInOut",

  "trigIn",
  "trigOut",
  "trigInOut",

  "expoIn",
  "expoOut",
  "expoInOut",

  "bounceIn",
  "bounceOut",
  "bounceInOut",

  "backIn",
  "backOut",
  "backInOut",

  "elasticIn",
  "elasticOut",
  "elasticInOut",
] as const;

export type EasingShape = (typeof EASING_SHAPES)[number];

export function isEasingShape(value: string): value is EasingShape {
  return EASING_SHAPES.some((shape) => shape === value);
}

/** An externally authored curve, such as a `KeyframeCurve`. */
export interface Curve {
  evaluate(t: number): number;
}

export interface EvaluateCurveOptions {
  /** Required by the `curve` shape, ignored by the others */
  curve?: Curve | null;
  logger?: Logger;
}

/**
 * Maps progress `t` to eased progress. `t` is not clamped; `back*` and
 * `elastic*` overshoot [0, 1] between the endpoints.
 *
 * Anomalies are logged and fall back to returning `t`.
 */
export function evaluateCurve(
  shape: EasingShape | null,
  t: number,
  { curve = null, logger }: EvaluateCurveOptions = {}
): number {
  switch (shape) {
    case "linear":
      return t;
    case "startValue":
      return 0;
    case "endValue":
      return 1;
    case "curve":
      if (curve === null) {
        logger?.error("Easing curve is missing", { shape });
        return t;
      }
      return curve.evaluate(t);

    case "quadIn":
      return t * t;
    case "quadOut":
      return 1 - (1 - t) * (1 - t);
    case "quadInOut":
      return t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2;

    case "cubicIn":
      return t * t * t;
    case "cubicOut":
      return 1 - Math.pow(1 - t, 3);
    case "cubicInOut":
      return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;

    case "trigIn":
      return 1 - Math.cos((t * Math.PI) / 2);
    case "trigOut":
      return Math.sin((t * Math.PI) / 2);
    case "trigInOut":
      return (Math.cos(Math.PI * t) - 1) / -2;

    case "expoIn":
      return t > 0 ? Math.pow(2, 10 * t - 10) : t;
    case "expoOut":
      return t < 1 ? 1 - Math.pow(2, -10 * t) : t;
    case "expoInOut":
      if (t === 0 || t === 1) return t;
      return t < 0.5
        ? Math.pow(2, 20 * t - 10) / 2
        : (2 - Math.pow(2, -20 * t + 10)) / 2;

    case "bounceIn":
      return 1 - bounceOut(1 - t);
    case "bounceOut":
      return bounceOut(t);
    case "bounceInOut":
      return t < 0.5
        ? (1 - bounceOut(1 - 2 * t)) / 2
        : (1 + bounceOut(2 * t - 1)) / 2;

    case "backIn":
      return 2.70158 * t * t * t - 1.70158 * t * t;
    case "backOut":
      return 1 + 2.70158 * Math.pow(t - 1, 3) + 1.70158 * Math.pow(t - 1, 2);
    case "backInOut":
      return t < 0.5
        ? (Math.pow(2 * t, 2) * ((2.595 + 1) * 2 * t - 2.595)) / 2
        : (Math.pow(2 * t - 2, 2) * ((2.595 + 1) * (t * 2 - 2) + 2.595) + 2) / 2;

    case "elasticIn":
      if (t === 0 || t === 1) return t;
      return -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * ELASTIC_PERIOD);
    case "elasticOut":
      if (t === 0 || t === 1) return t;
      return Math.pow(2, -10 * t) * Math.sin((t * 10 - 0.75) * ELASTIC_PERIOD) + 1;
    case "elasticInOut":
      if (t === 0 || t === 1) return t;
      return t < 0.5
        ? -(Math.pow(2, 20 * t - 10) * Math.sin((20 * t - 11.125) * ELASTIC_IN_OUT_PERIOD)) / 2
        : (Math.pow(2, -20 * t + 10) * Math.sin((20 * t - 11.125) * ELASTIC_IN_OUT_PERIOD)) / 2 + 1;

    default:
      logger?.warn("Easing shape not defined", { shape });
      return t;
  }
}

const ELASTIC_PERIOD = (2 * Math.PI) / 3;
const ELASTIC_IN_OUT_PERIOD = (2 * Math.PI) / 4.5;

const BOUNCE_N1 = 7.5625;
const BOUNCE_D1 = 2.75;

function bounceOut(t: number): number {
  if (t < 1 / BOUNCE_D1) {
    return BOUNCE_N1 * t * t;
  } else if (t < 2 / BOUNCE_D1) {
    const u = t - 1.5 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.75;
  } else if (t < 2.5 / BOUNCE_D1) {
    const u = t - 2.25 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.9375;
  } else {
    const u = t - 2.625 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.984375;
  }
}

/** `a + (b - a) * t` without clamping `t`. */
export function lerpUnclamped(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}
