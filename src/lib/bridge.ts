import type { Decimal } from "./numeric/decimal";

/** Handed to a bridge so the input surface can report raw text back. */
export interface NumericEditHandle {
  setValue(raw: string): void;
}

export interface NumericBridgeOptions {
  decimals: number;
  decimalsSeparator: string;
  step: Decimal;
  min: Decimal | null;
  max: Decimal | null;
}

/**
 * Connects a numeric edit to whatever drives its input element. Methods may
 * complete asynchronously; failures are logged by the caller.
 */
export interface NumericEditBridge {
  initialize(
    handle: NumericEditHandle,
    element: HTMLInputElement,
    elementId: string,
    options: NumericBridgeOptions,
  ): void | Promise<void>;
  update?(element: HTMLInputElement, elementId: string, options: NumericBridgeOptions): void | Promise<void>;
  destroy(element: HTMLInputElement, elementId: string): void | Promise<void>;
  releaseHandle(handle: NumericEditHandle): void | Promise<void>;
}
