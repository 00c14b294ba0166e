export { Field, type FieldProps } from "./components/Field";
export { NumericEdit, type NumericEditProps } from "./components/NumericEdit";
export { FieldKitProvider, useFieldKitConfig } from "./context/FieldKitContext";
export { useNumericEdit, type UseNumericEditOptions } from "./hooks/useNumericEdit";

export type { NumericBridgeOptions, NumericEditBridge, NumericEditHandle } from "./lib/bridge";
export { createBridgeLifecycle, type BridgeLifecycle, type BridgeLifecycleState } from "./lib/bridge-lifecycle";
export { ClassBuilder } from "./lib/class-builder";
export {
  bootstrapClassProvider,
  columnClasses,
  columnSize,
  tailwindClassProvider,
  type Breakpoint,
  type ClassProvider,
  type ColumnSize,
  type ColumnSizeEntry,
  type ColumnSpan,
} from "./lib/class-provider";
export { DEFAULT_CONFIG, mergeConfig, type FieldKitConfig, type FieldKitConfigOverrides } from "./lib/config";
export { acceptsKey, createDomBridge } from "./lib/dom-bridge";
export { buildBaseFieldClasses, buildFieldClasses, type FieldClassOptions } from "./lib/field-classes";
export { Decimal } from "./lib/numeric/decimal";
export { ParseError, UnsupportedKindError } from "./lib/numeric/errors";
export { resolveNumberSymbols, type FormattingContext, type NumberSymbols } from "./lib/numeric/formatting";
export {
  formatNumericValue,
  numericTypes,
  type NumericKind,
  type NumericType,
  type NumericTypeName,
  type ParseResult,
} from "./lib/numeric/kinds";
export { stepNumericValue, type StepAmount, type StepConstraints, type StepDirection } from "./lib/numeric/step";
export { cn } from "./lib/utils";
