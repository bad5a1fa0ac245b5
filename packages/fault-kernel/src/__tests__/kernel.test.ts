import assert from "node:assert/strict";
import { test } from "node:test";

import { FaultVerdictV1Z } from "@devicewatch/contracts";

import { ConfigurationError, InputContractError, InsufficientDataError } from "../errors";
import { evaluateDeviceDay, parseThresholds } from "../kernel";
import { THRESHOLDS, lcg, sameRateDay } from "./fixtures";

test("worn, in range, steady: not faulty", () => {
  const r = evaluateDeviceDay(sameRateDay([1, 1, 1], [36.0, 36.1, 36.0], [0.1, 0.1, 0.1]), THRESHOLDS);
  assert.equal(r.verdict.is_faulty, false);
  assert.deepEqual(r.verdict.explanation, {
    wrist_on: { "1:0": { temperature_out_of_range: false, temperature_high_variance: false, ppg_high_variance: false } },
    wrist_off: {},
  });
});

test("worn temperature above max_temp: faulty with out-of-range reported", () => {
  const r = evaluateDeviceDay(sameRateDay([1, 1, 1], [36.0, 42.0, 36.0], [0.1, 0.1, 0.1]), THRESHOLDS);
  assert.equal(r.verdict.is_faulty, true);
  assert.equal(r.verdict.explanation.wrist_on["1:0"].temperature_out_of_range, true);
});

test("unworn temperature stepping up: faulty with not-decreasing reported", () => {
  const r = evaluateDeviceDay(sameRateDay([0, 0, 0, 0], [30.0, 31.0, 29.0, 28.0], [0.1, 0.1, 0.1, 0.1]), THRESHOLDS);
  assert.equal(r.verdict.is_faulty, true);
  assert.deepEqual(r.verdict.explanation.wrist_off, {
    "0:0": { temperature_not_decreasing: true, ppg_high_variance_off: false },
  });
});

test("empty temperature stream: insufficient data, not a verdict", () => {
  assert.throws(
    () => evaluateDeviceDay(sameRateDay([1, 1, 1], [], [0.1, 0.1, 0.1]), THRESHOLDS),
    (e: unknown) =>
      e instanceof InsufficientDataError &&
      e.code === "INSUFFICIENT_DATA" &&
      e.message === "no aligned samples; empty streams: temperature"
  );
});

test("mixed rates: resampled, truncated and segmented on the fastest clock", () => {
  const r = evaluateDeviceDay(
    {
      wrist_contact: { rate_hz: 1, values: [1, 0, 1] },
      temperature: { rate_hz: 2, values: [36, 36, 35, 34] },
      ppg: { rate_hz: 4, values: [0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1] },
    },
    THRESHOLDS
  );
  assert.equal(r.target_rate_hz, 4);
  assert.equal(r.frame_length, 8);
  assert.deepEqual(r.segments, [
    { id: "1:0", wrist_contact: 1, start: 0, end: 3 },
    { id: "0:4", wrist_contact: 0, start: 4, end: 7 },
  ]);
  assert.equal(r.verdict.is_faulty, false);
  assert.deepEqual(Object.keys(r.verdict.explanation.wrist_off), ["0:4"]);
});

test("one violation anywhere flags the device-day and every segment stays in the explanation", () => {
  const r = evaluateDeviceDay(
    sameRateDay([1, 1, 0, 0, 1, 1], [36, 36, 35, 36, 36, 36], [0.1, 0.1, 0.1, 0.1, 0.1, 0.1]),
    THRESHOLDS
  );
  assert.equal(r.verdict.is_faulty, true);
  assert.deepEqual(Object.keys(r.verdict.explanation.wrist_on), ["1:0", "1:4"]);
  assert.equal(r.verdict.explanation.wrist_off["0:2"].temperature_not_decreasing, true);
  assert.equal(r.verdict.explanation.wrist_on["1:4"].temperature_out_of_range, false);
});

test("a very slow wrist stream against short fast streams gives a verdict", () => {
  const r = evaluateDeviceDay(
    {
      wrist_contact: { rate_hz: 2 ** -30, values: [1] },
      temperature: { rate_hz: 64, values: [36, 36, 36] },
      ppg: { rate_hz: 64, values: [0.1, 0.1, 0.1] },
    },
    THRESHOLDS
  );
  assert.equal(r.frame_length, 3);
  assert.deepEqual(r.segments, [{ id: "1:0", wrist_contact: 1, start: 0, end: 2 }]);
  assert.equal(r.verdict.is_faulty, false);
});

test("identical inputs give identical verdicts", () => {
  const next = lcg(7);
  const n = 256;
  const wrist = Array.from({ length: n / 64 }, () => (next() < 0.5 ? 1 : 0));
  const temperature = Array.from({ length: n / 16 }, () => 33 + next() * 4);
  const ppg = Array.from({ length: n }, () => next());
  const streams = {
    wrist_contact: { rate_hz: 1, values: wrist },
    temperature: { rate_hz: 4, values: temperature },
    ppg: { rate_hz: 64, values: ppg },
  };
  const a = evaluateDeviceDay(streams, THRESHOLDS);
  const b = evaluateDeviceDay(streams, THRESHOLDS);
  assert.deepEqual(a, b);
  assert.equal(JSON.stringify(a.verdict), JSON.stringify(b.verdict));
});

test("verdict serializes to the wire schema", () => {
  const r = evaluateDeviceDay(sameRateDay([0, 1, 1, 0], [34, 36, 36, 35], [0.1, 0.2, 0.1, 0.1]), THRESHOLDS);
  const wire = JSON.parse(JSON.stringify(r.verdict));
  assert.deepEqual(FaultVerdictV1Z.parse(wire), wire);
  assert.ok(Object.isFrozen(r.verdict));
});

test("thresholds with off-wrist ppg limit not below the worn one are rejected", () => {
  assert.throws(
    () => parseThresholds({ ...THRESHOLDS, ppg_std_off_max: 1 }),
    (e: unknown) => e instanceof ConfigurationError && e.message.includes("ppg_std_off_max must be < ppg_std_on_max")
  );
});

test("missing threshold is a configuration error", () => {
  const { max_temp: _omit, ...partial } = THRESHOLDS;
  assert.throws(() => parseThresholds(partial), ConfigurationError);
});

test("streams declared to start at different instants are rejected", () => {
  const day = sameRateDay([1, 1], [36, 36], [0.1, 0.1]);
  day.wrist_contact.started_at_ms = 0;
  day.ppg.started_at_ms = 1500;
  assert.throws(() => evaluateDeviceDay(day, THRESHOLDS, { max_start_skew_ms: 1000 }), InputContractError);
  assert.equal(evaluateDeviceDay(day, THRESHOLDS, { max_start_skew_ms: 2000 }).verdict.is_faulty, false);
});
