import { expect, test } from "vitest";
import { ConfigError, loadConfig } from "./config.ts";

test("defaults", () => {
  expect(loadConfig({})).toEqual({
    logLevel: "info",
    rngSeed: null,
    rngDeterministic: false,
    timeScale: 1,
  });
});

test("parses every variable", () => {
  const got = loadConfig({
    LOG_LEVEL: "WARN",
    RNG_SEED: "-42",
    RNG_DETERMINISTIC: "true",
    TIME_SCALE: "0.5",
    UNRELATED: "ignored",
  });

  expect(got).toEqual({
    logLevel: "warn",
    rngSeed: -42,
    rngDeterministic: true,
    timeScale: 0.5,
  });
});

test.each([
  [{ LOG_LEVEL: "verbose" }, "LOG_LEVEL"],
  [{ RNG_SEED: "1.5" }, "RNG_SEED"],
  [{ RNG_DETERMINISTIC: "yes" }, "RNG_DETERMINISTIC"],
  [{ TIME_SCALE: "0" }, "TIME_SCALE"],
  [{ RNG_DETERMINISTIC: "true" }, "RNG_SEED"],
])("rejects %o", (env, path) => {
  let caught: unknown = null;
  try {
    loadConfig(env);
  } catch (err) {
    caught = err;
  }

  expect(caught).toBeInstanceOf(ConfigError);
  if (caught instanceof ConfigError) {
    expect(caught.issues.map((i) => i.path.join("."))).toEqual([path]);
    expect(caught.message).toContain(path);
  }
});
