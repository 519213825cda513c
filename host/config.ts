import { z } from "zod";

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info"),
  RNG_SEED: z
    .string()
    .regex(/^-?\d+$/, "must be an integer")
    .transform(Number)
    .pipe(z.number().safe())
    .optional(),
  RNG_DETERMINISTIC: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),
  TIME_SCALE: z.coerce.number().positive().finite().default(1),
});

export type Config = {
  logLevel: "debug" | "info" | "warn" | "error";
  rngSeed: number | null;
  rngDeterministic: boolean;
  timeScale: number;
};

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      "invalid configuration: " +
        issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const { LOG_LEVEL, RNG_SEED, RNG_DETERMINISTIC, TIME_SCALE } = parsed.data;
  if (RNG_DETERMINISTIC && RNG_SEED === undefined) {
    throw new ConfigError([
      {
        code: z.ZodIssueCode.custom,
        path: ["RNG_SEED"],
        message: "required when RNG_DETERMINISTIC is true",
      },
    ]);
  }
  return {
    logLevel: LOG_LEVEL,
    rngSeed: RNG_SEED ?? null,
    rngDeterministic: RNG_DETERMINISTIC,
    timeScale: TIME_SCALE,
  };
}
