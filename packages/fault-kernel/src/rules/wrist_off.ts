// Checks for segments where the device is not worn: skin contact is gone, so
// temperature should only fall and PPG should be close to flat.

import { firstRiseAbove, sampleStd } from "./stats";
import type { WristOffRule } from "./types";

export const temperatureNotDecreasing: WristOffRule = {
  name: "temperature_not_decreasing",
  violated: (s, t) => firstRiseAbove(s.temperature, t.temp_decrease_tolerance) !== -1,
};

export const ppgHighVarianceOff: WristOffRule = {
  name: "ppg_high_variance_off",
  violated: (s, t) => {
    const std = sampleStd(s.ppg);
    return std !== null && std > t.ppg_std_off_max;
  },
};
