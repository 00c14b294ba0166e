import type { NumericEditBridge } from "./bridge";
import { bootstrapClassProvider, type ClassProvider } from "./class-provider";
import type { StepAmount } from "./numeric/step";

export interface NumericEditDefaults {
  decimals: number;
  step: StepAmount;
  decimalsSeparator?: string;
  culture?: string;
  /** Bridge used when a NumericEdit gets none; a DOM bridge per instance otherwise. */
  bridge?: NumericEditBridge;
}

export interface FieldKitConfig {
  classProvider: ClassProvider;
  numericEdit: NumericEditDefaults;
}

export interface FieldKitConfigOverrides {
  classProvider?: ClassProvider;
  numericEdit?: Partial<NumericEditDefaults>;
}

export const DEFAULT_CONFIG: FieldKitConfig = {
  classProvider: bootstrapClassProvider,
  numericEdit: {
    decimals: 2,
    step: 1,
  },
};

export function mergeConfig(base: FieldKitConfig, overrides: FieldKitConfigOverrides = {}): FieldKitConfig {
  return {
    classProvider: overrides.classProvider ?? base.classProvider,
    numericEdit: { ...base.numericEdit, ...overrides.numericEdit },
  };
}
