// Fault Kernel - error taxonomy
//
// Every failure the kernel surfaces for a device-day unit is one of these.
// Rule evaluation itself never throws.

import type { EvaluationErrorCode } from "@devicewatch/contracts";

export class DeviceEvaluationError extends Error {
  public readonly code: EvaluationErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: EvaluationErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "DeviceEvaluationError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid rates (non-positive, non-integral resample ratio) or invalid thresholds.
 * Not retryable without fixing configuration.
 */
export class ConfigurationError extends DeviceEvaluationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFIGURATION_INVALID", message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * One or more streams empty, so the aligned frame has no records.
 * Caller may retry once data backfills.
 */
export class InsufficientDataError extends DeviceEvaluationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("INSUFFICIENT_DATA", message, details);
    this.name = "InsufficientDataError";
  }
}

/**
 * Samples that break the aligner's preconditions: unequal lengths, wrist-contact
 * values other than 0/1, non-finite readings, or streams starting at different instants.
 */
export class InputContractError extends DeviceEvaluationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("INPUT_CONTRACT_VIOLATION", message, details);
    this.name = "InputContractError";
  }
}

export function isDeviceEvaluationError(e: unknown): e is DeviceEvaluationError {
  return e instanceof DeviceEvaluationError;
}
