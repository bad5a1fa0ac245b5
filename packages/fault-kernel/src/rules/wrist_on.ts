// Checks for segments where the device is worn.

import { anyOutside, sampleStd } from "./stats";
import type { WristOnRule } from "./types";

export const temperatureOutOfRange: WristOnRule = {
  name: "temperature_out_of_range",
  violated: (s, t) => anyOutside(s.temperature, t.min_temp, t.max_temp),
};

// Length-1 segments carry no variance evidence and never violate.
export const temperatureHighVariance: WristOnRule = {
  name: "temperature_high_variance",
  violated: (s, t) => {
    const std = sampleStd(s.temperature);
    return std !== null && std > t.temp_std_on_max;
  },
};

export const ppgHighVariance: WristOnRule = {
  name: "ppg_high_variance",
  violated: (s, t) => {
    const std = sampleStd(s.ppg);
    return std !== null && std > t.ppg_std_on_max;
  },
};
