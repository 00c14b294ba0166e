import { describe, it, expect } from "vitest";
import { Decimal } from "./decimal";
import { numericTypes } from "./kinds";
import { stepNumericValue, toStepDecimal } from "./step";

describe("toStepDecimal", () => {
  it("defaults to one", () => {
    expect(toStepDecimal(undefined).toString()).toBe("1");
    expect(toStepDecimal(null).toString()).toBe("1");
  });

  it("accepts numbers, strings and decimals", () => {
    expect(toStepDecimal(0.25).toString()).toBe("0.25");
    expect(toStepDecimal("0.1").toString()).toBe("0.1");
    expect(toStepDecimal(Decimal.from("5")).toString()).toBe("5");
  });
});

describe("stepNumericValue", () => {
  it("stops at the maximum", () => {
    expect(stepNumericValue(numericTypes.int32, 5, "up", { step: 1, max: 5 })).toBeNull();
    expect(stepNumericValue(numericTypes.int32, 4, "up", { step: 1, max: 5 })).toBe(5);
  });

  it("stops at the minimum", () => {
    expect(stepNumericValue(numericTypes.int32, 0, "down", { min: 0 })).toBeNull();
    expect(stepNumericValue(numericTypes.int32, 1, "down", { min: 0 })).toBe(0);
  });

  it("steps a decimal by a fractional amount", () => {
    const next = stepNumericValue(numericTypes.decimal, Decimal.from("2.50"), "up", { step: "0.25" });
    expect(next?.toString()).toBe("2.75");
  });

  it("starts from zero when there is no value", () => {
    expect(stepNumericValue(numericTypes.int32, null, "up")).toBe(1);
    expect(stepNumericValue(numericTypes.int32, undefined, "down", { step: 3 })).toBe(-3);
  });

  it("returns to the starting value after stepping up and back down", () => {
    const up = stepNumericValue(numericTypes.float64, 0.1, "up", { step: 0.2 });
    expect(up).toBe(0.3);
    expect(stepNumericValue(numericTypes.float64, up, "down", { step: 0.2 })).toBe(0.1);
  });

  it("truncates fractional steps on integer kinds", () => {
    expect(stepNumericValue(numericTypes.int32, 5, "up", { step: 1.5 })).toBe(6);
    expect(stepNumericValue(numericTypes.int32, 5, "up", { step: 0.5 })).toBeNull();
  });

  it("does nothing for a zero step", () => {
    expect(stepNumericValue(numericTypes.int32, 5, "up", { step: 0 })).toBeNull();
  });

  it("does nothing when the result does not fit the kind", () => {
    expect(stepNumericValue(numericTypes.uint8, 255, "up")).toBeNull();
    expect(stepNumericValue(numericTypes.uint8, 0, "down")).toBeNull();
  });

  it("steps 64-bit values past the safe integer range exactly", () => {
    expect(stepNumericValue(numericTypes.int64, 9007199254740993n, "up")).toBe(9007199254740994n);
  });
});
