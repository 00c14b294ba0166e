import { Decimal } from "./decimal";
import type { NumericType } from "./kinds";

export type StepDirection = "up" | "down";

export type StepAmount = number | string | Decimal;

export interface StepConstraints<T> {
  step?: StepAmount | null;
  min?: T | null;
  max?: T | null;
}

export function toStepDecimal(step: StepAmount | null | undefined): Decimal {
  return step === null || step === undefined ? Decimal.ONE : Decimal.from(step);
}

/**
 * Next value one step away from `current`, or null when the step is blocked:
 * the result equals the current value, falls outside `[min, max]`, or does
 * not fit the kind. Arithmetic happens in decimal for every kind, so a
 * fractional step on an integer kind truncates toward zero on the way back.
 */
export function stepNumericValue<T>(
  type: NumericType<T>,
  current: T | null | undefined,
  direction: StepDirection,
  constraints: StepConstraints<T> = {},
): T | null {
  const step = toStepDecimal(constraints.step);
  const base = current === null || current === undefined ? null : type.toDecimal(current);
  const next = (base ?? Decimal.ZERO).add(direction === "up" ? step : step.negate());

  if (base !== null && next.equals(base)) return null;

  const { min, max } = constraints;
  const lower = min === null || min === undefined ? Decimal.MIN_VALUE : type.toDecimal(min);
  const upper = max === null || max === undefined ? Decimal.MAX_VALUE : type.toDecimal(max);
  if (next.compare(upper) > 0 || next.compare(lower) < 0) return null;

  const converted = type.fromDecimal(next);
  if (converted === null) return null;
  if (current !== null && current !== undefined && type.equals(converted, current)) return null;
  return converted;
}
