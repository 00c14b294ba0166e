import type { NumericBridgeOptions, NumericEditBridge, NumericEditHandle } from "./bridge";

export type BridgeLifecycleState = "unmounted" | "mounted" | "disposed";

export interface BridgeLifecycle {
  readonly state: BridgeLifecycleState;
  /** Acquires the handle and initializes the bridge. Only acts when unmounted. */
  mount(element: HTMLInputElement, elementId: string, options: NumericBridgeOptions): void;
  /** Pushes changed options to a mounted bridge. */
  update(options: NumericBridgeOptions): void;
  /** Tears down and releases the handle; safe to call in any state. */
  dispose(): void;
}

function runBridgeCall(action: string, call: () => void | Promise<void>): void {
  try {
    const pending = call();
    if (pending instanceof Promise) {
      pending.catch((err: unknown) => console.error(`Failed to ${action} numeric edit:`, err));
    }
  } catch (err) {
    console.error(`Failed to ${action} numeric edit:`, err);
  }
}

/**
 * unmounted → mounted → disposed. The handle lives exactly as long as the
 * mounted state: callbacks that arrive before mount or after dispose are
 * dropped.
 */
export function createBridgeLifecycle(
  bridge: NumericEditBridge,
  onValue: (raw: string) => void,
): BridgeLifecycle {
  let state: BridgeLifecycleState = "unmounted";
  let mounted: { element: HTMLInputElement; elementId: string } | null = null;

  const handle: NumericEditHandle = {
    setValue(raw) {
      if (state === "mounted") onValue(raw);
    },
  };

  return {
    get state() {
      return state;
    },

    mount(element, elementId, options) {
      if (state !== "unmounted") return;
      state = "mounted";
      mounted = { element, elementId };
      runBridgeCall("initialize", () => bridge.initialize(handle, element, elementId, options));
    },

    update(options) {
      if (state !== "mounted" || !mounted || !bridge.update) return;
      const { element, elementId } = mounted;
      const update = bridge.update.bind(bridge);
      runBridgeCall("update", () => update(element, elementId, options));
    },

    dispose() {
      if (state === "mounted" && mounted) {
        const { element, elementId } = mounted;
        runBridgeCall("destroy", () => bridge.destroy(element, elementId));
        runBridgeCall("release", () => bridge.releaseHandle(handle));
      }
      mounted = null;
      state = "disposed";
    },
  };
}
