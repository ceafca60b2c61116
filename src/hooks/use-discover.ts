"use client";

import { useEffect } from "react";
import { useSpotlight } from "@/lib/spotlight-context";

/**
 * Activates the first unseen popup of `page` once the page has mounted,
 * optionally after `delay` ms so the popup doesn't show before the page
 * settles.
 */
export function useDiscover(page: string, delay = 0) {
  const { manager } = useSpotlight();

  useEffect(() => {
    if (!manager) return;
    if (delay <= 0) {
      manager.discover(page);
      return;
    }

    const timer = setTimeout(() => {
      manager.discover(page);
    }, delay);

    return () => clearTimeout(timer);
  }, [manager, page, delay]);
}
