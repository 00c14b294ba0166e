import type { ClassBuilder } from "./class-builder";
import { type ClassProvider, type ColumnSize, columnClasses } from "./class-provider";

export interface FieldClassOptions {
  columnSize?: ColumnSize | null;
  horizontal?: boolean;
  className?: string;
}

export function buildBaseFieldClasses(builder: ClassBuilder, options: FieldClassOptions, provider: ClassProvider) {
  builder.append(provider.field());
  if (options.horizontal) builder.append(provider.fieldHorizontal());
  builder.append(options.className);
}

/** Column classes first, then whatever the base field contributes. */
export function buildFieldClasses(builder: ClassBuilder, options: FieldClassOptions, provider: ClassProvider) {
  if (options.columnSize) builder.append(columnClasses(options.columnSize, provider));
  buildBaseFieldClasses(builder, options, provider);
}
