export interface FormattingContext {
  /** BCP 47 tag such as "de-DE". Invariant symbols apply when unset. */
  culture?: string;
  /** Overrides the culture's decimal symbol. */
  decimalsSeparator?: string;
  /** Maximum fraction digits the input surface accepts. */
  decimals: number;
}

export interface NumberSymbols {
  decimal: string;
  group: string;
}

export const INVARIANT_SYMBOLS: NumberSymbols = { decimal: ".", group: "," };

const symbolCache = new Map<string, NumberSymbols>();

function cultureSymbols(culture: string): NumberSymbols {
  const cached = symbolCache.get(culture);
  if (cached) return cached;

  let symbols = INVARIANT_SYMBOLS;
  try {
    const parts = new Intl.NumberFormat(culture).formatToParts(12345.6);
    symbols = {
      decimal: parts.find((p) => p.type === "decimal")?.value ?? INVARIANT_SYMBOLS.decimal,
      group: parts.find((p) => p.type === "group")?.value ?? INVARIANT_SYMBOLS.group,
    };
  } catch (err) {
    console.warn(`Unknown culture "${culture}", using invariant number symbols:`, err);
  }

  symbolCache.set(culture, symbols);
  return symbols;
}

export function resolveNumberSymbols(context: FormattingContext): NumberSymbols {
  const base = context.culture ? cultureSymbols(context.culture) : INVARIANT_SYMBOLS;
  if (!context.decimalsSeparator) return base;
  return { ...base, decimal: context.decimalsSeparator };
}

/**
 * Rewrites culture-formatted input into invariant notation: group symbols
 * dropped, decimal symbol turned into ".". Returns null when the decimal
 * symbol shows up more than once.
 */
export function toInvariant(raw: string, symbols: NumberSymbols, allowGroups: boolean): string | null {
  let text = raw.trim();
  if (allowGroups && symbols.group && symbols.group !== symbols.decimal) {
    text = text.split(symbols.group).join("");
  }
  if (symbols.decimal === ".") return text;

  const pieces = text.split(symbols.decimal);
  if (pieces.length > 2) return null;
  if (pieces.some((piece) => piece.includes("."))) return null;
  return pieces.join(".");
}

export function fromInvariant(text: string, symbols: NumberSymbols): string {
  return symbols.decimal === "." ? text : text.replace(".", symbols.decimal);
}
