import { expect, test } from "vitest";
import { Random } from "./Random.ts";
import { scriptedSource } from "../testHelpers.ts";

test("float", () => {
  const subject = new Random(scriptedSource([0, 2 ** 31, 2 ** 32 - 1]));

  expect(subject.float()).toBe(0);
  expect(subject.float()).toBe(0.5);
  expect(subject.float()).toBeLessThan(1);
});

test("range lerps by float", () => {
  const subject = new Random(scriptedSource([2 ** 31]));

  expect(subject.range(2, 4)).toBe(3);
  expect(subject.range(4, 2)).toBe(3);
});

test("int rejects outputs below the bias threshold", () => {
  // 2^32 % 5 == 1, so an output of 0 is redrawn
  const subject = new Random(scriptedSource([0, 7]));

  expect(subject.int(5, 10)).toBe(7);
});

test("int with an empty range returns min", () => {
  const subject = new Random(scriptedSource([9]));

  expect(subject.int(3, 3)).toBe(3);
});

test("int rejects bad bounds", () => {
  const subject = new Random(scriptedSource([0]));

  expect(() => subject.int(5, 4)).toThrow(RangeError);
  expect(() => subject.int(0.5, 4)).toThrow(RangeError);
});

test("int stays within [min, max)", () => {
  const subject = Random.withSeed(7);
  const seen = new Set<number>();
  for (let i = 0; i < 1000; i++) {
    seen.add(subject.int(5, 10));
  }
  expect([...seen].sort()).toEqual([5, 6, 7, 8, 9]);
});

test("of", () => {
  // 2^32 % 3 == 1, and 4 % 3 == 1
  const subject = new Random(scriptedSource([4]));

  expect(subject.of(["a", "b", "c"])).toBe("b");
  expect(() => subject.of([])).toThrow(RangeError);
});

test("withSeed is repeatable", () => {
  const a = Random.withSeed(123);
  const b = Random.withSeed(123);
  const c = Random.withSeed(124);

  const seqA = Array.from({ length: 5 }, () => a.float());
  const seqB = Array.from({ length: 5 }, () => b.float());
  const seqC = Array.from({ length: 5 }, () => c.float());

  expect(seqA).toEqual(seqB);
  expect(seqA).not.toEqual(seqC);
});
