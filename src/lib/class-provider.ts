export type Breakpoint = "sm" | "md" | "lg" | "xl" | "xxl";

export type ColumnSpan = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | "auto";

export interface ColumnSizeEntry {
  size: ColumnSpan;
  /** Applies from this breakpoint up; every width when omitted. */
  breakpoint?: Breakpoint;
}

export type ColumnSize = ColumnSizeEntry | readonly ColumnSizeEntry[];

/** Maps layout concepts to the class names of one CSS framework. */
export interface ClassProvider {
  field(): string;
  fieldHorizontal(): string;
  fieldLabel(): string;
  column(entry: ColumnSizeEntry): string;
  input(): string;
  inputSpinner(): string;
}

export function columnSize(size: ColumnSpan, breakpoint?: Breakpoint): ColumnSizeEntry {
  return breakpoint ? { size, breakpoint } : { size };
}

function isEntryList(size: ColumnSize): size is readonly ColumnSizeEntry[] {
  return Array.isArray(size);
}

export function columnClasses(size: ColumnSize, provider: ClassProvider): string[] {
  const entries = isEntryList(size) ? size : [size];
  return entries.map((entry) => provider.column(entry));
}

export const bootstrapClassProvider: ClassProvider = {
  field: () => "form-group",
  fieldHorizontal: () => "row",
  fieldLabel: () => "col-form-label",
  column: ({ size, breakpoint }) => (breakpoint ? `col-${breakpoint}-${size}` : `col-${size}`),
  input: () => "form-control",
  inputSpinner: () => "btn-group-vertical",
};

export const tailwindClassProvider: ClassProvider = {
  field: () => "flex flex-col gap-1.5",
  fieldHorizontal: () => "flex-row items-center justify-between gap-4",
  fieldLabel: () => "text-sm text-text-secondary shrink-0",
  column: ({ size, breakpoint }) => {
    const span = size === "auto" ? "col-auto" : `col-span-${size}`;
    return breakpoint ? `${breakpoint}:${span}` : span;
  },
  input:
    () => "w-24 px-2 py-1 bg-surface-raised border border-border/60 text-sm text-text-primary font-mono outline-none focus:border-accent/40 transition-colors",
  inputSpinner: () => "flex flex-col border border-l-0 border-border/60",
};
