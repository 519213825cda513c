#!/usr/bin/env -S npx tsx

import * as dotenv from "dotenv";
import minimist from "minimist";
import { z } from "zod";
import { EASING_SHAPES, RngRegistry, DEFAULT_RNG_CHANNELS } from "../core/index.ts";
import { loadConfig } from "../host/config.ts";
import { setupLogs } from "../host/log.ts";
import { drawChannel, plotEasing } from "./plot.ts";

dotenv.config();
const config = loadConfig(process.env);
const log = setupLogs(config.logLevel);

const args = minimist(process.argv.slice(2), {
  string: ["shape", "loop", "channel"],
});

const ArgsSchema = z.object({
  shape: z.enum(EASING_SHAPES).default("linear"),
  loop: z.enum(["none", "reset", "pingPong", "pingPongOnce"]).default("none"),
  duration: z.coerce.number().positive().default(1),
  from: z.coerce.number().default(0),
  to: z.coerce.number().default(1),
  fps: z.coerce.number().positive().default(30),
  frames: z.coerce.number().int().nonnegative().default(45),
  pauseFrom: z.coerce.number().int().nonnegative().optional(),
  pauseTo: z.coerce.number().int().nonnegative().optional(),
  channel: z.enum(DEFAULT_RNG_CHANNELS).optional(),
  draws: z.coerce.number().int().positive().default(10),
  min: z.coerce.number().int().default(0),
  max: z.coerce.number().int().default(100),
});

const parsed = ArgsSchema.safeParse(args);
if (!parsed.success) {
  for (const issue of parsed.error.issues) {
    log.error("invalid argument", { arg: issue.path.join("."), message: issue.message });
  }
  process.exit(2);
}
const opts = parsed.data;

log.info("starting", { args: opts, config });

if (opts.channel !== undefined) {
  const registry = RngRegistry.withDefaultChannels({ logger: log });
  if (config.rngSeed !== null) {
    registry.setSeed(opts.channel, config.rngSeed);
  }
  registry.setEnabled(opts.channel, config.rngDeterministic);
  for (const line of drawChannel(registry, opts.channel, opts.draws, opts.min, opts.max)) {
    console.log(line);
  }
} else {
  const pause: [number, number] | undefined =
    opts.pauseFrom !== undefined && opts.pauseTo !== undefined
      ? [opts.pauseFrom, opts.pauseTo]
      : undefined;
  const lines = plotEasing(
    {
      shape: opts.shape,
      loop: opts.loop,
      duration: opts.duration,
      from: opts.from,
      to: opts.to,
      fps: opts.fps,
      frames: opts.frames,
      timeScale: config.timeScale,
      pause,
    },
    log
  );
  for (const line of lines) {
    console.log(line);
  }
}
