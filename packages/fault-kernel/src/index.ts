// @devicewatch/fault-kernel
// Entry point exports for the device fault detection pipeline.

export * from "./kernel";
export * from "./errors";
export * from "./streams";
export * from "./resample/resampler";
export * from "./align/aligner";
export * from "./segment/segmenter";
export * from "./rules/stats";
export * from "./rules/types";
export * from "./rules/wrist_on";
export * from "./rules/wrist_off";
export * from "./rules/evaluator";
export * from "./verdict/aggregator";
