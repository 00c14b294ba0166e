import type { KeyboardEvent } from "react";
import { ChevronDown, ChevronUp } from "lucide-react";
import { useFieldKitConfig } from "@/context/FieldKitContext";
import { type UseNumericEditOptions, useNumericEdit } from "@/hooks/useNumericEdit";
import { cn } from "@/lib/utils";

export interface NumericEditProps<T> extends UseNumericEditOptions<T> {
  /** Visible width of the input in characters (the `size` attribute). */
  visibleCharacters?: number;
  showSpinner?: boolean;
  placeholder?: string;
  className?: string;
}

export function NumericEdit<T>({
  visibleCharacters,
  showSpinner = false,
  placeholder,
  className,
  ...options
}: NumericEditProps<T>) {
  const { classProvider } = useFieldKitConfig();
  const { text, elementId, inputRef, stepValue, editText, resetText } = useNumericEdit(options);
  const { disabled, readOnly, numericType } = options;

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
    if (e.key !== "ArrowUp" && e.key !== "ArrowDown") return;
    e.preventDefault();
    stepValue(e.key === "ArrowUp" ? "up" : "down");
  };

  const input = (
    <input
      ref={inputRef}
      id={elementId}
      type="text"
      inputMode={numericType.kind.type === "integer" ? "numeric" : "decimal"}
      value={text}
      size={visibleCharacters}
      placeholder={placeholder}
      disabled={disabled}
      readOnly={readOnly}
      onChange={(e) => editText(e.target.value)}
      onBlur={resetText}
      onKeyDown={handleKeyDown}
      className={cn(classProvider.input(), !showSpinner && className)}
    />
  );

  if (!showSpinner) return input;

  const locked = disabled || readOnly;
  return (
    <div className={cn("inline-flex items-stretch", className)}>
      {input}
      <div className={classProvider.inputSpinner()}>
        <button
          type="button"
          aria-label="Increase value"
          tabIndex={-1}
          disabled={locked}
          onClick={() => stepValue("up")}
          className="flex items-center justify-center px-1 text-text-muted hover:text-text-primary disabled:opacity-40"
        >
          <ChevronUp className="size-3" strokeWidth={2} />
        </button>
        <button
          type="button"
          aria-label="Decrease value"
          tabIndex={-1}
          disabled={locked}
          onClick={() => stepValue("down")}
          className="flex items-center justify-center px-1 text-text-muted hover:text-text-primary disabled:opacity-40"
        >
          <ChevronDown className="size-3" strokeWidth={2} />
        </button>
      </div>
    </div>
  );
}
