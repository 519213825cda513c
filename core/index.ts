export { Easing } from "./Easing.ts";
export type { EasingOptions, LoopMode, PlayState } from "./Easing.ts";
export {
  EASING_SHAPES,
  evaluateCurve,
  isEasingShape,
  lerpUnclamped,
} from "./curves.ts";
export type { Curve, EasingShape, EvaluateCurveOptions } from "./curves.ts";
export { KeyframeCurve } from "./KeyframeCurve.ts";
export type { Keyframe } from "./KeyframeCurve.ts";
export { RngRegistry, DEFAULT_RNG_CHANNELS } from "./RngRegistry.ts";
export type { DefaultRngChannel, RngRegistryOptions } from "./RngRegistry.ts";
export { Random } from "./Random/Random.ts";
export type { RandomSource } from "./Random/Random.ts";
export { Pcg32Source } from "./Random/Pcg32Source.ts";
export { Clock, defaultFrameClock } from "./Clock.ts";
export type { FrameClock } from "./Clock.ts";
export { ManualClock } from "./ManualClock.ts";
export { ManualLooper } from "./Looper.ts";
export type { Looper } from "./Looper.ts";
export { PlatformFrameClock } from "./platform/PlatformFrameClock.ts";
export { IntervalLooper } from "./platform/IntervalLooper.ts";
export {
  PlatformRandomSource,
  platformRandom,
} from "./platform/PlatformRandomSource.ts";
export { ConsoleLogger, NoopLogger, RecordingLogger } from "./Logger.ts";
export type { Logger, LogEntry, LogLevel } from "./Logger.ts";
