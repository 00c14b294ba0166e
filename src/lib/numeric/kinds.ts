import { Decimal } from "./decimal";
import { ParseError, UnsupportedKindError } from "./errors";
import {
  type FormattingContext,
  fromInvariant,
  resolveNumberSymbols,
  toInvariant,
} from "./formatting";

export type IntegerWidth = 8 | 16 | 32 | 64;
export type FloatWidth = 32 | 64;

export type NumericKind =
  | { readonly type: "integer"; readonly width: IntegerWidth; readonly signed: boolean }
  | { readonly type: "float"; readonly width: FloatWidth }
  | { readonly type: "decimal" };

export type ParseResult<T> =
  | { ok: true; value: T | null }
  | { ok: false; error: ParseError };

/**
 * Ties a numeric kind to the TypeScript type that carries its values and
 * to the conversions a numeric edit needs.
 */
export interface NumericType<T> {
  readonly kind: NumericKind;
  parse(raw: string, context: FormattingContext): ParseResult<T>;
  format(value: T, context: FormattingContext): string;
  toDecimal(value: T): Decimal;
  /** Null when `value` does not fit the kind. Integer kinds truncate. */
  fromDecimal(value: Decimal): T | null;
  equals(a: T, b: T): boolean;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

function integerRange(width: IntegerWidth, signed: boolean): [bigint, bigint] {
  const bits = BigInt(width);
  return signed ? [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n] : [0n, (1n << bits) - 1n];
}

/** Shortest text that reads back as the same single-precision value. */
function shortestFloat32(value: number): string {
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(value);
}

function unsupported(kind: never): never {
  throw new UnsupportedKindError(kind);
}

function mismatch(kind: NumericKind, value: unknown): never {
  throw new UnsupportedKindError(kind, `cannot format a value of type ${typeof value}`);
}

/**
 * Renders `value` in invariant notation for `kind`. Exhaustive over the kind
 * union; a value whose runtime type or range does not belong to the kind is rejected.
 */
export function formatInvariant(kind: NumericKind, value: unknown): string {
  switch (kind.type) {
    case "integer": {
      let whole: bigint;
      if (typeof value === "bigint") whole = value;
      else if (typeof value === "number" && Number.isInteger(value)) whole = BigInt(value);
      else return mismatch(kind, value);

      const [min, max] = integerRange(kind.width, kind.signed);
      if (whole < min || whole > max) {
        throw new UnsupportedKindError(kind, `${whole} is outside ${min}..${max}`);
      }
      return whole.toString();
    }
    case "float":
      if (typeof value !== "number") return mismatch(kind, value);
      return kind.width === 32 ? shortestFloat32(value) : String(value);
    case "decimal":
      if (value instanceof Decimal) return value.toString();
      return mismatch(kind, value);
    default:
      return unsupported(kind);
  }
}

export function formatNumeric(kind: NumericKind, value: unknown, context: FormattingContext): string {
  return fromInvariant(formatInvariant(kind, value), resolveNumberSymbols(context));
}

function parseWith<T>(
  kind: NumericKind,
  raw: string,
  context: FormattingContext,
  allowGroups: boolean,
  read: (invariant: string) => T | null,
): ParseResult<T> {
  if (raw.trim() === "") return { ok: true, value: null };

  const invariant = toInvariant(raw, resolveNumberSymbols(context), allowGroups);
  const value = invariant === null ? null : read(invariant);
  if (value === null) return { ok: false, error: new ParseError(raw, kind) };
  return { ok: true, value };
}

function integerType(width: 8 | 16 | 32, signed: boolean): NumericType<number> {
  const kind: NumericKind = { type: "integer", width, signed };
  const [min, max] = integerRange(width, signed);
  const fit = (value: bigint) => (value < min || value > max ? null : Number(value));

  return {
    kind,
    parse: (raw, context) =>
      parseWith(kind, raw, context, false, (text) => (INTEGER_PATTERN.test(text) ? fit(BigInt(text)) : null)),
    format: (value, context) => formatNumeric(kind, value, context),
    toDecimal: (value) => Decimal.from(value),
    fromDecimal: (value) => fit(value.truncate()),
    equals: (a, b) => a === b,
  };
}

function bigIntegerType(signed: boolean): NumericType<bigint> {
  const kind: NumericKind = { type: "integer", width: 64, signed };
  const [min, max] = integerRange(64, signed);
  const fit = (value: bigint) => (value < min || value > max ? null : value);

  return {
    kind,
    parse: (raw, context) =>
      parseWith(kind, raw, context, false, (text) => (INTEGER_PATTERN.test(text) ? fit(BigInt(text)) : null)),
    format: (value, context) => formatNumeric(kind, value, context),
    toDecimal: (value) => Decimal.from(value),
    fromDecimal: (value) => fit(value.truncate()),
    equals: (a, b) => a === b,
  };
}

function floatType(width: FloatWidth): NumericType<number> {
  const kind: NumericKind = { type: "float", width };
  const fit = (value: number) => {
    const stored = width === 32 ? Math.fround(value) : value;
    return Number.isFinite(stored) ? stored : null;
  };

  return {
    kind,
    parse: (raw, context) =>
      parseWith(kind, raw, context, true, (text) => (FLOAT_PATTERN.test(text) ? fit(Number(text)) : null)),
    format: (value, context) => formatNumeric(kind, value, context),
    toDecimal: (value) => Decimal.from(formatInvariant(kind, value)),
    fromDecimal: (value) => fit(value.toNumber()),
    equals: (a, b) => a === b,
  };
}

function decimalType(): NumericType<Decimal> {
  const kind: NumericKind = { type: "decimal" };
  const fit = (value: Decimal) => {
    if (value.compare(Decimal.MAX_VALUE) > 0 || value.compare(Decimal.MIN_VALUE) < 0) return null;
    return value.roundToScale(Decimal.MAX_SCALE);
  };

  return {
    kind,
    parse: (raw, context) =>
      parseWith(kind, raw, context, true, (text) => {
        if (!DECIMAL_PATTERN.test(text)) return null;
        const parsed = Decimal.parse(text);
        return parsed === null ? null : fit(parsed);
      }),
    format: (value, context) => formatNumeric(kind, value, context),
    toDecimal: (value) => value,
    fromDecimal: fit,
    equals: (a, b) => a.equals(b),
  };
}

export const numericTypes = {
  int8: integerType(8, true),
  int16: integerType(16, true),
  int32: integerType(32, true),
  int64: bigIntegerType(true),
  uint8: integerType(8, false),
  uint16: integerType(16, false),
  uint32: integerType(32, false),
  uint64: bigIntegerType(false),
  float32: floatType(32),
  float64: floatType(64),
  decimal: decimalType(),
} as const;

export type NumericTypeName = keyof typeof numericTypes;

/** Null for an unset value, otherwise the value formatted for its kind. */
export function formatNumericValue<T>(
  type: NumericType<T>,
  value: T | null | undefined,
  context: FormattingContext,
): string | null {
  if (value === null || value === undefined) return null;
  return type.format(value, context);
}
