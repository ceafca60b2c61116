"use client";

import { createContext, useContext, useMemo, type ReactNode } from "react";
import type { EdgeInsets, SpotlightTheme } from "@/types/spotlight";
import { NO_INSETS, RESERVED_TOP } from "./placement";
import type { PopupManager } from "./popup-manager";

export const DEFAULT_THEME: SpotlightTheme = {
  background: "#111111",
  foreground: "#ffffff",
};

interface SpotlightContextValue {
  manager: PopupManager | null;
  theme: SpotlightTheme;
  reservedTop: number;
  insets: EdgeInsets;
}

const SpotlightContext = createContext<SpotlightContextValue>({
  manager: null,
  theme: DEFAULT_THEME,
  reservedTop: RESERVED_TOP,
  insets: NO_INSETS,
});

interface SpotlightProviderProps {
  manager: PopupManager;
  theme?: Partial<SpotlightTheme>;
  /** Height of the top chrome popups must stay clear of */
  reservedTop?: number;
  /** Safe-area insets of the viewport */
  insets?: EdgeInsets;
  children: ReactNode;
}

export function SpotlightProvider({
  manager,
  theme,
  reservedTop = RESERVED_TOP,
  insets = NO_INSETS,
  children,
}: SpotlightProviderProps) {
  const value = useMemo(
    () => ({
      manager,
      theme: { ...DEFAULT_THEME, ...theme },
      reservedTop,
      insets,
    }),
    [manager, theme, reservedTop, insets]
  );

  return (
    <SpotlightContext.Provider value={value}>{children}</SpotlightContext.Provider>
  );
}

export function useSpotlight() {
  return useContext(SpotlightContext);
}
