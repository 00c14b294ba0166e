import { useFieldKitConfig } from "@/context/FieldKitContext";
import { ClassBuilder } from "@/lib/class-builder";
import type { ColumnSize } from "@/lib/class-provider";
import { buildFieldClasses } from "@/lib/field-classes";

export interface FieldProps {
  label?: string;
  /** Id of the control the label describes. */
  htmlFor?: string;
  columnSize?: ColumnSize;
  horizontal?: boolean;
  className?: string;
  children: React.ReactNode;
}

export function Field({ label, htmlFor, columnSize, horizontal, className, children }: FieldProps) {
  const { classProvider } = useFieldKitConfig();
  const builder = new ClassBuilder();
  buildFieldClasses(builder, { columnSize, horizontal, className }, classProvider);

  return (
    <div className={builder.build()}>
      {label && (
        <label htmlFor={htmlFor} className={classProvider.fieldLabel()}>
          {label}
        </label>
      )}
      {children}
    </div>
  );
}
