// @devicewatch/contracts
// Runtime schemas (zod) and inferred types shared by the kernel and the monitor app.

export * from "./schema/sample_stream_v1";
export * from "./schema/fault_thresholds_v1";
export * from "./schema/fault_verdict_v1";
export * from "./schema/device_day_outcome_v1";
export * from "./schema/device_alert_v1";
export * from "./issues";
