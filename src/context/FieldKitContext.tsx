import { createContext, useContext, useMemo, type ReactNode } from "react";
import { DEFAULT_CONFIG, mergeConfig, type FieldKitConfigOverrides, type FieldKitConfig } from "@/lib/config";

const FieldKitContext = createContext<FieldKitConfig>(DEFAULT_CONFIG);

/** Overrides fieldkit defaults for everything below it; nested providers stack. */
export function FieldKitProvider({
  config,
  children,
}: {
  config: FieldKitConfigOverrides;
  children: ReactNode;
}) {
  const parent = useContext(FieldKitContext);
  const value = useMemo(() => mergeConfig(parent, config), [parent, config]);
  return <FieldKitContext.Provider value={value}>{children}</FieldKitContext.Provider>;
}

export function useFieldKitConfig() {
  return useContext(FieldKitContext);
}
