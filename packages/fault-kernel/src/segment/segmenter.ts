// Fault Kernel - wrist-contact segmenter
//
// Splits an aligned frame into maximal runs of constant wrist_contact so that
// put-on / take-off transitions never mix two regimes inside one rule evaluation.

import type { AlignedFrame, WristContact } from "../align/aligner";

export type Segment = Readonly<{
  // "<wrist_contact>:<start_index>"
  id: string;
  wrist_contact: WristContact;
  start: number;
  // inclusive
  end: number;
  temperature: ReadonlyArray<number>;
  ppg: ReadonlyArray<number>;
}>;

export type SegmentedFrame = {
  // All segments in start order; partitions the frame.
  all: ReadonlyArray<Segment>;
  wrist_on: ReadonlyArray<Segment>;
  wrist_off: ReadonlyArray<Segment>;
};

export function segmentId(wristContact: WristContact, start: number): string {
  return `${wristContact}:${start}`;
}

function makeSegment(frame: AlignedFrame, start: number, end: number): Segment {
  const wrist_contact = frame[start].wrist_contact;
  const temperature: number[] = [];
  const ppg: number[] = [];
  for (let i = start; i <= end; i++) {
    temperature.push(frame[i].temperature);
    ppg.push(frame[i].ppg);
  }
  return Object.freeze({
    id: segmentId(wrist_contact, start),
    wrist_contact,
    start,
    end,
    temperature: Object.freeze(temperature),
    ppg: Object.freeze(ppg),
  });
}

export function segmentFrame(frame: AlignedFrame): SegmentedFrame {
  const all: Segment[] = [];
  let start = 0;
  for (let i = 1; i <= frame.length; i++) {
    if (i === frame.length || frame[i].wrist_contact !== frame[start].wrist_contact) {
      all.push(makeSegment(frame, start, i - 1));
      start = i;
    }
  }

  return {
    all: Object.freeze(all),
    wrist_on: Object.freeze(all.filter((s) => s.wrist_contact === 1)),
    wrist_off: Object.freeze(all.filter((s) => s.wrist_contact === 0)),
  };
}
