import type { DeviceDayStreamsV1, FaultThresholdsV1 } from "@devicewatch/contracts";

export const THRESHOLDS: FaultThresholdsV1 = {
  min_temp: 30,
  max_temp: 40,
  temp_std_on_max: 0.5,
  ppg_std_on_max: 1,
  temp_decrease_tolerance: 0.05,
  ppg_std_off_max: 0.5,
};

// All three streams at the same rate, so sample i of each lines up directly.
export function sameRateDay(wrist: number[], temperature: number[], ppg: number[], rate_hz = 1): DeviceDayStreamsV1 {
  return {
    wrist_contact: { rate_hz, values: wrist },
    temperature: { rate_hz, values: temperature },
    ppg: { rate_hz, values: ppg },
  };
}

// Deterministic pseudo-random sequence (LCG) for property-style checks.
export function lcg(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 0x100000000;
  };
}
