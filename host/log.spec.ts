import { expect, test } from "vitest";
import { setupLogs } from "./log.ts";

function capture() {
  const lines: string[] = [];
  const destination = { write: (msg: string) => void lines.push(msg) };
  const records = () => lines.map((l): Record<string, unknown> => JSON.parse(l));
  return { destination, records };
}

test("writes structured records with merged props", () => {
  const { destination, records } = capture();
  const subject = setupLogs("debug", destination);

  subject.child({ component: "RngRegistry" }).warn("rng channel enabled without a seed", {
    channel: "loot",
  });

  const [record] = records();
  expect(record.level).toBe(40);
  expect(record.msg).toBe("rng channel enabled without a seed");
  expect(record.component).toBe("RngRegistry");
  expect(record.channel).toBe("loot");
  expect(record).not.toHaveProperty("pid");
});

test("filters below the configured level", () => {
  const { destination, records } = capture();
  const subject = setupLogs("warn", destination);

  subject.debug("hidden");
  subject.info("hidden");
  subject.warn("shown");
  subject.error("shown too");

  expect(records().map((r) => r.msg)).toEqual(["shown", "shown too"]);
  expect(records().map((r) => r.level)).toEqual([40, 50]);
});
