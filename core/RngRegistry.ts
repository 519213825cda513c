import { Random } from "./Random/Random.ts";
import { platformRandom } from "./platform/PlatformRandomSource.ts";
import { ConsoleLogger, type Logger } from "./Logger.ts";

export const DEFAULT_RNG_CHANNELS = [
  "world",
  "spawn",
  "loot",
  "combat",
  "ai",
  "cosmetic",
] as const;

export type DefaultRngChannel = (typeof DEFAULT_RNG_CHANNELS)[number];

export interface RngRegistryOptions {
  /** Used by disabled and unseeded channels. Defaults to the platform source. */
  fallback?: Random;
  logger?: Logger;
}

interface ChannelSlot {
  generator: Random | null;
  enabled: boolean;
  warnedUnseeded: boolean;
}

/**
 * Named random channels. A channel draws from its own seeded generator while
 * enabled, and from the fallback source otherwise, so one subsystem (say loot
 * rolls) can be replayed without pinning every other use of randomness.
 *
 * Seeding does not enable a channel; call `setEnabled` as well.
 */
export class RngRegistry<C extends string = DefaultRngChannel> {
  readonly channels: readonly C[];

  private readonly _index = new Map<C, number>();
  private _slots: ChannelSlot[] | null = null;
  private readonly _fallback: Random;
  private readonly _l: Logger;

  constructor(channels: readonly C[], opts: RngRegistryOptions = {}) {
    if (channels.length === 0) {
      throw new Error("RngRegistry needs at least one channel");
    }
    channels.forEach((channel, i) => {
      if (this._index.has(channel)) {
        throw new Error(`duplicate rng channel: ${channel}`);
      }
      this._index.set(channel, i);
    });
    this.channels = [...channels];
    this._fallback = opts.fallback ?? platformRandom();
    this._l = (opts.logger ?? new ConsoleLogger()).child({ component: "RngRegistry" });
    this.initializeIfNeeded();
  }

  static withDefaultChannels(opts: RngRegistryOptions = {}): RngRegistry<DefaultRngChannel> {
    return new RngRegistry(DEFAULT_RNG_CHANNELS, opts);
  }

  /** Creates an unseeded, disabled slot for every channel. No-op after the first call. */
  initializeIfNeeded(): void {
    this._ensureSlots();
  }

  /** Replaces the channel's generator. Leaves the enabled flag alone. */
  setSeed(channel: C, seed: number): void {
    const slot = this._slot(channel);
    slot.generator = Random.withSeed(seed);
    slot.warnedUnseeded = false;
    this._l.debug("seeded rng channel", { channel, seed });
  }

  setEnabled(channel: C, enabled: boolean): void {
    this._slot(channel).enabled = enabled;
  }

  isEnabled(channel: C): boolean {
    return this._slot(channel).enabled;
  }

  isSeeded(channel: C): boolean {
    return this._slot(channel).generator !== null;
  }

  /** A number r where 0 <= r < 1 */
  float(channel: C): number {
    return this._source(channel).float();
  }

  /** `min + (max - min) * float(channel)` */
  range(channel: C, min: number, max: number): number {
    return this._source(channel).range(min, max);
  }

  /** An integer r where min <= r < max */
  rangeInt(channel: C, min: number, max: number): number {
    return this._source(channel).int(min, max);
  }

  private _source(channel: C): Random {
    const slot = this._slot(channel);
    if (!slot.enabled) return this._fallback;
    if (slot.generator === null) {
      if (!slot.warnedUnseeded) {
        slot.warnedUnseeded = true;
        this._l.warn("rng channel enabled without a seed, using fallback", {
          channel,
        });
      }
      return this._fallback;
    }
    return slot.generator;
  }

  private _ensureSlots(): ChannelSlot[] {
    if (this._slots === null) {
      this._slots = this.channels.map(() => ({
        generator: null,
        enabled: false,
        warnedUnseeded: false,
      }));
    }
    return this._slots;
  }

  private _slot(channel: C): ChannelSlot {
    const slots = this._ensureSlots();
    const i = this._index.get(channel);
    if (i === undefined) {
      throw new Error(`unknown rng channel: ${channel}`);
    }
    return slots[i];
  }
}
