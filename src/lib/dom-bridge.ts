import type { NumericBridgeOptions, NumericEditBridge, NumericEditHandle } from "./bridge";

interface Registration {
  element: HTMLInputElement;
  options: NumericBridgeOptions;
  onChange: () => void;
  onKeyDown: (event: KeyboardEvent) => void;
}

/**
 * Whether typing `key` into `element` keeps the text a plausible number:
 * digits, one decimal separator when decimals are allowed, and a leading
 * minus when the minimum permits negatives.
 */
export function acceptsKey(element: HTMLInputElement, key: string, options: NumericBridgeOptions): boolean {
  // Named keys (Backspace, ArrowLeft, Tab, ...) pass through.
  if (key.length !== 1) return true;

  const text = element.value;
  const start = element.selectionStart ?? text.length;
  const end = element.selectionEnd ?? start;
  const next = text.slice(0, start) + key + text.slice(end);

  if (key === "-") {
    if (options.min && options.min.sign >= 0) return false;
    return start === 0 && !text.slice(end).includes("-");
  }

  if (key === options.decimalsSeparator) {
    return options.decimals > 0 && next.split(key).length === 2;
  }

  if (key >= "0" && key <= "9") {
    const separatorAt = next.indexOf(options.decimalsSeparator);
    if (separatorAt < 0) return true;
    return next.length - separatorAt - options.decimalsSeparator.length <= options.decimals;
  }

  return false;
}

/**
 * Default bridge for a plain `<input>`: forwards committed text on `change`
 * and filters keystrokes that could never parse.
 */
export function createDomBridge(): NumericEditBridge {
  const registrations = new Map<string, Registration>();
  const handles = new Set<NumericEditHandle>();

  return {
    initialize(handle, element, elementId, options) {
      if (registrations.has(elementId)) return;
      handles.add(handle);

      const registration: Registration = {
        element,
        options,
        onChange: () => {
          if (handles.has(handle)) handle.setValue(element.value);
        },
        onKeyDown: (event) => {
          if (event.ctrlKey || event.metaKey || event.altKey) return;
          if (!acceptsKey(element, event.key, registration.options)) event.preventDefault();
        },
      };

      element.addEventListener("change", registration.onChange);
      element.addEventListener("keydown", registration.onKeyDown);
      registrations.set(elementId, registration);
    },

    update(_element, elementId, options) {
      const registration = registrations.get(elementId);
      if (registration) registration.options = options;
    },

    destroy(_element, elementId) {
      const registration = registrations.get(elementId);
      if (!registration) return;
      registration.element.removeEventListener("change", registration.onChange);
      registration.element.removeEventListener("keydown", registration.onKeyDown);
      registrations.delete(elementId);
    },

    releaseHandle(handle) {
      handles.delete(handle);
    },
  };
}
