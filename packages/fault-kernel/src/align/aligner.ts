// Fault Kernel - positional aligner
//
// Zips the three resampled streams into one frame. Positional zipping is only
// valid when the recordings share a start instant, so that precondition is
// checked here whenever the caller supplies start instants.

import type { DeviceDayStreamsV1 } from "@devicewatch/contracts";
import { STREAM_KINDS } from "@devicewatch/contracts";

import { InputContractError } from "../errors";
import type { PerStream } from "../streams";

export type WristContact = 0 | 1;

export type AlignedRecord = {
  index: number;
  wrist_contact: WristContact;
  temperature: number;
  ppg: number;
};

export type AlignedFrame = ReadonlyArray<Readonly<AlignedRecord>>;

function toWristContact(v: number, index: number): WristContact {
  if (v === 1) return 1;
  if (v === 0) return 0;
  throw new InputContractError(`wrist_contact must be 0 or 1 (got ${v} at index ${index})`, { index, value: v });
}

function assertFinite(kind: string, v: number, index: number): number {
  if (!Number.isFinite(v)) {
    throw new InputContractError(`${kind} sample is not a finite number at index ${index}`, { kind, index });
  }
  return v;
}

/**
 * Fails when two or more streams declare start instants further apart than `maxSkewMs`.
 * Streams without `started_at_ms` are not compared.
 */
export function assertCommonStart(input: DeviceDayStreamsV1, maxSkewMs: number): void {
  const starts: Array<{ kind: string; ts: number }> = [];
  for (const kind of STREAM_KINDS) {
    const ts = input[kind].started_at_ms;
    if (typeof ts === "number") starts.push({ kind, ts });
  }
  if (starts.length < 2) return;

  const min = Math.min(...starts.map((s) => s.ts));
  const max = Math.max(...starts.map((s) => s.ts));
  if (max - min > maxSkewMs) {
    throw new InputContractError(`streams start ${max - min} ms apart (max ${maxSkewMs} ms)`, {
      started_at_ms: Object.fromEntries(starts.map((s) => [s.kind, s.ts])),
      max_start_skew_ms: maxSkewMs,
    });
  }
}

export function alignStreams(streams: PerStream<ReadonlyArray<number>>): AlignedFrame {
  const n = streams.wrist_contact.length;
  if (streams.temperature.length !== n || streams.ppg.length !== n) {
    throw new InputContractError("aligned streams must have equal length", {
      lengths: { wrist_contact: n, temperature: streams.temperature.length, ppg: streams.ppg.length },
    });
  }

  const frame: AlignedRecord[] = new Array(n);
  for (let i = 0; i < n; i++) {
    frame[i] = Object.freeze({
      index: i,
      wrist_contact: toWristContact(streams.wrist_contact[i], i),
      temperature: assertFinite("temperature", streams.temperature[i], i),
      ppg: assertFinite("ppg", streams.ppg[i], i),
    });
  }
  return Object.freeze(frame);
}
