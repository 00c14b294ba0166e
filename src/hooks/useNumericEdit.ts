import { useCallback, useEffect, useId, useMemo, useRef, useState } from "react";
import { useFieldKitConfig } from "@/context/FieldKitContext";
import type { NumericBridgeOptions, NumericEditBridge } from "@/lib/bridge";
import { type BridgeLifecycle, createBridgeLifecycle } from "@/lib/bridge-lifecycle";
import { createDomBridge } from "@/lib/dom-bridge";
import type { ParseError } from "@/lib/numeric/errors";
import { type FormattingContext, resolveNumberSymbols } from "@/lib/numeric/formatting";
import { formatNumericValue, type NumericType, type ParseResult } from "@/lib/numeric/kinds";
import { type StepAmount, type StepDirection, stepNumericValue, toStepDecimal } from "@/lib/numeric/step";

export interface UseNumericEditOptions<T> {
  numericType: NumericType<T>;
  /** Controlled value. Leave undefined to let the hook own the value. */
  value?: T | null;
  onValueChange?: (value: T | null) => void;
  /** Called when text from the input cannot be parsed; the value is kept. */
  onParseError?: (error: ParseError) => void;
  min?: T | null;
  max?: T | null;
  step?: StepAmount | null;
  decimals?: number;
  decimalsSeparator?: string;
  culture?: string;
  disabled?: boolean;
  readOnly?: boolean;
  id?: string;
  bridge?: NumericEditBridge;
}

export function useNumericEdit<T>(options: UseNumericEditOptions<T>) {
  const defaults = useFieldKitConfig().numericEdit;
  const { numericType, min, max } = options;
  const decimals = options.decimals ?? defaults.decimals;
  const decimalsSeparator = options.decimalsSeparator ?? defaults.decimalsSeparator;
  const culture = options.culture ?? defaults.culture;
  const step = options.step ?? defaults.step;
  const bridge = options.bridge ?? defaults.bridge;

  const generatedId = useId();
  const elementId = options.id ?? generatedId;
  // Callback ref: a replaced <input> remounts the bridge on the new element.
  const [element, inputRef] = useState<HTMLInputElement | null>(null);

  const context = useMemo<FormattingContext>(
    () => ({ culture, decimalsSeparator, decimals }),
    [culture, decimalsSeparator, decimals],
  );

  const [value, setValueState] = useState<T | null>(options.value ?? null);
  // Text typed but not yet committed; null shows the formatted value.
  const [draft, setDraft] = useState<string | null>(null);
  const valueRef = useRef(value);

  const latest = useRef({ options, context, step });
  latest.current = { options, context, step };

  useEffect(() => {
    const incoming = options.value;
    if (incoming === undefined) return;
    const current = valueRef.current;
    if (incoming === current) return;
    if (incoming !== null && current !== null && numericType.equals(incoming, current)) return;

    valueRef.current = incoming;
    setValueState(incoming);
    setDraft(null);
  }, [options.value, numericType]);

  const setValue = useCallback((raw: string): ParseResult<T> => {
    const { options: current, context: formatting } = latest.current;
    const result = current.numericType.parse(raw, formatting);
    if (!result.ok) {
      current.onParseError?.(result.error);
      return result;
    }

    valueRef.current = result.value;
    setValueState(result.value);
    current.onValueChange?.(result.value);
    return result;
  }, []);

  const formatValue = useCallback(
    (): string | null => formatNumericValue(latest.current.options.numericType, valueRef.current, latest.current.context),
    [],
  );

  const stepValue = useCallback(
    (direction: StepDirection) => {
      const { options: current, context: formatting, step: amount } = latest.current;
      if (current.disabled || current.readOnly) return;

      const next = stepNumericValue(current.numericType, valueRef.current, direction, {
        step: amount,
        min: current.min,
        max: current.max,
      });
      if (next === null) return;

      const result = setValue(current.numericType.format(next, formatting));
      if (result.ok) setDraft(null);
    },
    [setValue],
  );

  const resetText = useCallback(() => setDraft(null), []);

  const separator = resolveNumberSymbols(context).decimal;
  const stepDecimal = toStepDecimal(step);
  const minDecimal = min === null || min === undefined ? null : numericType.toDecimal(min);
  const maxDecimal = max === null || max === undefined ? null : numericType.toDecimal(max);
  const stepKey = stepDecimal.toString();
  const minKey = minDecimal?.toString() ?? null;
  const maxKey = maxDecimal?.toString() ?? null;

  // Keyed on the decimal text so inline bound objects do not churn the bridge.
  const bridgeOptions = useMemo<NumericBridgeOptions>(
    () => ({ decimals, decimalsSeparator: separator, step: stepDecimal, min: minDecimal, max: maxDecimal }),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [decimals, separator, stepKey, minKey, maxKey],
  );

  const lifecycleRef = useRef<BridgeLifecycle | null>(null);
  const pushedOptionsRef = useRef<NumericBridgeOptions | null>(null);
  const bridgeOptionsRef = useRef(bridgeOptions);
  bridgeOptionsRef.current = bridgeOptions;

  useEffect(() => {
    if (!element) return;

    const lifecycle = createBridgeLifecycle(bridge ?? createDomBridge(), (raw) => {
      setValue(raw);
    });
    lifecycle.mount(element, elementId, bridgeOptionsRef.current);
    lifecycleRef.current = lifecycle;
    pushedOptionsRef.current = bridgeOptionsRef.current;

    return () => {
      lifecycle.dispose();
      lifecycleRef.current = null;
    };
  }, [bridge, element, elementId, setValue]);

  useEffect(() => {
    const lifecycle = lifecycleRef.current;
    if (!lifecycle || pushedOptionsRef.current === bridgeOptions) return;
    lifecycle.update(bridgeOptions);
    pushedOptionsRef.current = bridgeOptions;
  }, [bridgeOptions]);

  return {
    value,
    text: draft ?? formatNumericValue(numericType, value, context) ?? "",
    elementId,
    inputRef,
    setValue,
    formatValue,
    stepValue,
    editText: setDraft,
    resetText,
  };
}
