import { expect, test } from "vitest";
import { Clock } from "../../../core/Clock.ts";
import { TestClock } from "./TestClock.ts";

test("starts at zero", () => {
  const subject = new TestClock();

  expect(subject.time(true)).toBe(0);
  expect(subject.time(false)).toBe(0);
  expect(subject.deltaTime(true)).toBe(0);
});

test("advance", () => {
  const subject = new TestClock();

  subject.advance(0.5);
  subject.advance(0.25);

  expect(subject.time(false)).toBe(0.75);
  expect(subject.deltaTime(false)).toBe(0.25);
});

test("timeScale only affects scaled readings", () => {
  const subject = new TestClock();
  subject.timeScale = 0.5;

  subject.advance(1);

  expect(subject.time(true)).toBe(0.5);
  expect(subject.deltaTime(true)).toBe(0.5);
  expect(subject.time(false)).toBe(1);
  expect(subject.deltaTime(false)).toBe(1);
});

test("rejects negative steps", () => {
  const subject = new TestClock();

  expect(() => subject.advance(-1)).toThrow(RangeError);
  expect(subject.time(false)).toBe(0);
});

test("install and uninstall", () => {
  const before = Clock.__debugGetGlobal();

  const subject = TestClock.install();
  expect(Clock.__debugGetGlobal()).toBe(subject);

  subject.advance(2);
  expect(Clock.time(false)).toBe(2);
  expect(Clock.deltaTime(false)).toBe(2);

  subject.uninstall();
  expect(Clock.__debugGetGlobal()).toBe(before);
});
