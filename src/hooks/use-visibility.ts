"use client";

import { useCallback, useSyncExternalStore } from "react";
import type { VisibilityHandle } from "@/lib/observable-value";

export function useVisibility(handle: VisibilityHandle): boolean {
  const subscribe = useCallback(
    (onChange: () => void) => handle.subscribe(onChange),
    [handle]
  );
  const read = useCallback(() => handle.get(), [handle]);
  return useSyncExternalStore(subscribe, read, read);
}
