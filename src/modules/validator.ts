/**
 * Validator Module
 * Checks the requested spindle speed once per batch
 */

import { InvalidSpeedError, OutOfRangeSpeedError } from "../utils/errors";
import type { SpeedConfig, TargetSpeed } from "../types";

/**
 * Canonical decimal form written into files
 *
 * @example
 * formatSpeed(12000) // "12000"
 * formatSpeed(9500.5) // "9500.5"
 */
export function formatSpeed(rpm: number): string {
  return Number.isInteger(rpm) ? rpm.toFixed(0) : String(rpm);
}

// Plain decimal notation only: no hex, exponents or Infinity
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse operator input into a number
 * Range checks are left to validateSpeed
 */
export function parseSpeed(input: string): number {
  const trimmed = input.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidSpeedError(
      input,
      "Invalid input. Please enter a valid number",
    );
  }

  return Number(trimmed);
}

/**
 * Accept a speed inside the inclusive [minRpm, maxRpm] range.
 * Zero, negative and non-finite values are rejected whatever the range says.
 */
export function validateSpeed(value: number, range: SpeedConfig): TargetSpeed {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidSpeedError(
      value,
      `Invalid spindle speed: ${value} (must be a positive number)`,
    );
  }

  if (value < range.minRpm || value > range.maxRpm) {
    throw new OutOfRangeSpeedError(value, range.minRpm, range.maxRpm);
  }

  return Object.freeze({ rpm: value, literal: formatSpeed(value) });
}
