const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Immutable base-10 number: `coefficient × 10^-scale`.
 *
 * Arithmetic is exact, so fractional steps such as 0.1 accumulate without
 * binary rounding drift. The scale is kept through `add`, which means
 * `2.50 + 0.25` prints as `2.75` and `2.50 + 1` as `3.50`.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);
  /** Largest magnitude a decimal value may hold (2^96 - 1). */
  static readonly MAX_VALUE = new Decimal(79228162514264337593543950335n, 0);
  static readonly MIN_VALUE = new Decimal(-79228162514264337593543950335n, 0);
  static readonly MAX_SCALE = 28;

  private constructor(
    readonly coefficient: bigint,
    readonly scale: number,
  ) {}

  /**
   * Parses invariant notation (`-12.5`, `.5`, `1e-7`). Returns null for
   * anything else, including an empty string.
   */
  static parse(text: string): Decimal | null {
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) return null;

    const [, sign, integerDigits = "", fractionDigits = "", exponentText] = match;
    if (integerDigits.length === 0 && fractionDigits.length === 0) return null;

    let coefficient = BigInt(integerDigits + fractionDigits);
    let scale = fractionDigits.length - (exponentText ? Number(exponentText) : 0);
    if (scale < 0) {
      coefficient *= pow10(-scale);
      scale = 0;
    }

    return new Decimal(sign === "-" ? -coefficient : coefficient, scale);
  }

  static from(value: number | bigint | string | Decimal): Decimal {
    if (value instanceof Decimal) return value;
    if (typeof value === "bigint") return new Decimal(value, 0);
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new RangeError(`Cannot convert ${value} to a decimal`);
    }

    const parsed = Decimal.parse(String(value).trim());
    if (!parsed) {
      throw new RangeError(`Cannot convert "${value}" to a decimal`);
    }
    return parsed;
  }

  get sign(): -1 | 0 | 1 {
    if (this.coefficient === 0n) return 0;
    return this.coefficient < 0n ? -1 : 1;
  }

  negate(): Decimal {
    return new Decimal(-this.coefficient, this.scale);
  }

  add(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(
      this.coefficient * pow10(scale - this.scale) + other.coefficient * pow10(scale - other.scale),
      scale,
    );
  }

  subtract(other: Decimal): Decimal {
    return this.add(other.negate());
  }

  compare(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const left = this.coefficient * pow10(scale - this.scale);
    const right = other.coefficient * pow10(scale - other.scale);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }

  /** Numeric equality: `2.5` equals `2.50`. */
  equals(other: Decimal): boolean {
    return this.compare(other) === 0;
  }

  /** Integer part, rounded toward zero. */
  truncate(): bigint {
    return this.coefficient / pow10(this.scale);
  }

  /** Rounds half away from zero to at most `scale` fraction digits. */
  roundToScale(scale: number): Decimal {
    if (this.scale <= scale) return this;

    const factor = pow10(this.scale - scale);
    let quotient = this.coefficient / factor;
    const remainder = this.coefficient % factor;
    if (abs(remainder) * 2n >= factor) {
      quotient += this.coefficient < 0n ? -1n : 1n;
    }
    return new Decimal(quotient, scale);
  }

  toNumber(): number {
    return Number(this.toString());
  }

  /** Invariant notation with the scale preserved, e.g. `-0.50`. */
  toString(): string {
    const digits = abs(this.coefficient).toString().padStart(this.scale + 1, "0");
    const sign = this.coefficient < 0n ? "-" : "";
    if (this.scale === 0) return sign + digits;

    const point = digits.length - this.scale;
    return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
  }
}
