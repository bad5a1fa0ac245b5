import assert from "node:assert/strict";
import { test } from "node:test";

import { alignStreams, assertCommonStart } from "../align/aligner";
import { InputContractError } from "../errors";
import { sameRateDay } from "./fixtures";

test("aligns streams positionally", () => {
  const frame = alignStreams({ wrist_contact: [1, 0], temperature: [36.5, 35.9], ppg: [0.2, 0.1] });
  assert.deepEqual(frame, [
    { index: 0, wrist_contact: 1, temperature: 36.5, ppg: 0.2 },
    { index: 1, wrist_contact: 0, temperature: 35.9, ppg: 0.1 },
  ]);
  assert.ok(Object.isFrozen(frame));
  assert.ok(Object.isFrozen(frame[0]));
});

test("rejects wrist_contact values other than 0 and 1", () => {
  assert.throws(
    () => alignStreams({ wrist_contact: [1, 2], temperature: [36, 36], ppg: [1, 1] }),
    (e: unknown) => e instanceof InputContractError && e.details.index === 1 && e.details.value === 2
  );
});

test("rejects non-finite readings", () => {
  assert.throws(() => alignStreams({ wrist_contact: [1], temperature: [NaN], ppg: [1] }), InputContractError);
  assert.throws(() => alignStreams({ wrist_contact: [1], temperature: [36], ppg: [Infinity] }), InputContractError);
});

test("rejects unequal lengths", () => {
  assert.throws(() => alignStreams({ wrist_contact: [1, 1], temperature: [36], ppg: [1, 1] }), InputContractError);
});

test("start instants within the allowed skew pass", () => {
  const day = sameRateDay([1], [36], [1]);
  day.wrist_contact.started_at_ms = 1_612_224_000_000;
  day.temperature.started_at_ms = 1_612_224_000_500;
  assertCommonStart(day, 1000);
});

test("start instants further apart than the allowed skew fail", () => {
  const day = sameRateDay([1], [36], [1]);
  day.wrist_contact.started_at_ms = 1_612_224_000_000;
  day.ppg.started_at_ms = 1_612_224_002_000;
  assert.throws(
    () => assertCommonStart(day, 1000),
    (e: unknown) => e instanceof InputContractError && e.message === "streams start 2000 ms apart (max 1000 ms)"
  );
});

test("a single declared start instant has nothing to compare", () => {
  const day = sameRateDay([1], [36], [1]);
  day.temperature.started_at_ms = 5;
  assertCommonStart(day, 0);
});
