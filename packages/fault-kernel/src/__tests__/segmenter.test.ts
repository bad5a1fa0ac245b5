import assert from "node:assert/strict";
import { test } from "node:test";

import { alignStreams } from "../align/aligner";
import { segmentFrame } from "../segment/segmenter";
import { lcg } from "./fixtures";

function frameOf(wrist: number[]) {
  return alignStreams({
    wrist_contact: wrist,
    temperature: wrist.map((_, i) => 30 + i),
    ppg: wrist.map((_, i) => i / 10),
  });
}

test("splits on every wrist_contact change", () => {
  const s = segmentFrame(frameOf([1, 1, 0, 0, 0, 1]));
  assert.deepEqual(
    s.all.map((x) => [x.id, x.start, x.end]),
    [
      ["1:0", 0, 1],
      ["0:2", 2, 4],
      ["1:5", 5, 5],
    ]
  );
  assert.deepEqual(
    s.wrist_on.map((x) => x.id),
    ["1:0", "1:5"]
  );
  assert.deepEqual(
    s.wrist_off.map((x) => x.id),
    ["0:2"]
  );
  assert.deepEqual(s.wrist_off[0].temperature, [32, 33, 34]);
  assert.deepEqual(s.wrist_off[0].ppg, [0.2, 0.3, 0.4]);
});

test("a constant frame is a single segment", () => {
  const s = segmentFrame(frameOf([0, 0, 0, 0]));
  assert.equal(s.all.length, 1);
  assert.equal(s.wrist_on.length, 0);
  assert.deepEqual([s.all[0].start, s.all[0].end], [0, 3]);
});

test("segments partition the frame exactly", () => {
  const next = lcg(42);
  for (let round = 0; round < 20; round++) {
    const n = 1 + Math.floor(next() * 200);
    const wrist = Array.from({ length: n }, () => (next() < 0.8 ? 1 : 0));
    const frame = frameOf(wrist);
    const { all, wrist_on, wrist_off } = segmentFrame(frame);

    assert.equal(wrist_on.length + wrist_off.length, all.length);
    let expectedStart = 0;
    for (const seg of all) {
      assert.equal(seg.start, expectedStart);
      assert.ok(seg.end >= seg.start);
      for (let i = seg.start; i <= seg.end; i++) assert.equal(frame[i].wrist_contact, seg.wrist_contact);
      expectedStart = seg.end + 1;
    }
    assert.equal(expectedStart, n);
    // Adjacent segments differ, so every segment is maximal.
    for (let k = 1; k < all.length; k++) assert.notEqual(all[k].wrist_contact, all[k - 1].wrist_contact);
  }
});
