import type { NumericKind } from "./kinds";

export function describeKind(kind: unknown): string {
  if (typeof kind !== "object" || kind === null) return String(kind);
  return JSON.stringify(kind);
}

/** Raised when a string cannot be read as a value of the given kind. */
export class ParseError extends Error {
  readonly input: string;
  readonly kind: NumericKind;

  constructor(input: string, kind: NumericKind) {
    super(`Cannot parse "${input}" as ${describeKind(kind)}`);
    this.name = "ParseError";
    this.input = input;
    this.kind = kind;
  }
}

/**
 * Raised when a value or descriptor falls outside the supported kinds.
 * Always a programming error; callers are not expected to recover.
 */
export class UnsupportedKindError extends Error {
  readonly kind: unknown;

  constructor(kind: unknown, detail?: string) {
    super(`Unsupported numeric kind ${describeKind(kind)}${detail ? `: ${detail}` : ""}`);
    this.name = "UnsupportedKindError";
    this.kind = kind;
  }
}
