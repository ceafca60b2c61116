"use client";

import {
  useState,
  useCallback,
  useLayoutEffect,
  useMemo,
  useRef,
  type MouseEvent,
  type ReactNode,
} from "react";
import { createPortal } from "react-dom";
import { motion } from "framer-motion";
import type { BorderRadius, LayoutGeometry, PlacementResult } from "@/types/spotlight";
import type { VisibilityHandle } from "@/lib/observable-value";
import { overlayPosition } from "@/lib/placement";
import { createPlacementScheduler } from "@/lib/placement-scheduler";
import { resolvePopupOptions, type PopupOptionsInput } from "@/lib/popup-options";
import { useSpotlight } from "@/lib/spotlight-context";
import { cn } from "@/lib/utils";
import { useVisibility } from "@/hooks/use-visibility";
import { IndicatorIcon } from "./indicator-icon";

interface SpotlightPopupProps extends PopupOptionsInput {
  notifier: VisibilityHandle;
  content: ReactNode;
  /** The target element the popup points at */
  children: ReactNode;
  className?: string;
}

interface Layout {
  placement: PlacementResult;
  geometry: LayoutGeometry;
}

const WIGGLE = [0, -3, 3, -3, 0];

/**
 * Size of the layout viewport that fixed `right`/`bottom` offsets are measured
 * from. Unlike `innerWidth` it excludes scrollbars.
 */
function layoutViewport() {
  const root = document.documentElement;
  return {
    width: root.clientWidth || window.innerWidth,
    height: root.clientHeight || window.innerHeight,
  };
}

function cssRadius(r: BorderRadius) {
  return `${r["top-left"]}px ${r["top-right"]}px ${r["bottom-right"]}px ${r["bottom-left"]}px`;
}

/**
 * Wraps a target and, while its notifier is true, shows a popup next to it
 * in the quadrant with the most room. Clicking the popup dismisses it.
 */
export function SpotlightPopup({
  notifier,
  content,
  children,
  className,
  backgroundColor,
  foregroundColor,
  wiggle,
  period,
  indicator,
}: SpotlightPopupProps) {
  const { theme, reservedTop, insets } = useSpotlight();
  const options = useMemo(
    () =>
      resolvePopupOptions({ backgroundColor, foregroundColor, wiggle, period, indicator }),
    [backgroundColor, foregroundColor, wiggle, period, indicator]
  );
  const visible = useVisibility(notifier);
  const [layout, setLayout] = useState<Layout | null>(null);
  const targetRef = useRef<HTMLDivElement>(null);
  const rafRef = useRef<number>(0);

  const measure = useCallback((): LayoutGeometry | null => {
    const el = targetRef.current;
    if (!el || !el.isConnected) return null;
    const r = el.getBoundingClientRect();
    return {
      target: { left: r.left, top: r.top, width: r.width, height: r.height },
      viewport: layoutViewport(),
      insets,
      reservedTop,
    };
  }, [insets, reservedTop]);

  useLayoutEffect(() => {
    if (!visible) return;

    const scheduler = createPlacementScheduler({
      measure,
      onPlacement: (placement, geometry) => setLayout({ placement, geometry }),
    });

    const handleLayout = () => {
      scheduler.request();
      cancelAnimationFrame(rafRef.current);
      rafRef.current = requestAnimationFrame(() => scheduler.layoutReady());
    };

    handleLayout();
    window.addEventListener("resize", handleLayout);
    window.addEventListener("scroll", handleLayout, true);

    return () => {
      scheduler.detach();
      cancelAnimationFrame(rafRef.current);
      window.removeEventListener("resize", handleLayout);
      window.removeEventListener("scroll", handleLayout, true);
      setLayout(null);
    };
  }, [visible, measure]);

  // The portal is still inside the target's React tree; keep the tap from
  // reaching the host's own handlers.
  const dismiss = useCallback(
    (event: MouseEvent<HTMLDivElement>) => {
      event.stopPropagation();
      notifier.set(false);
    },
    [notifier]
  );

  const overlay =
    visible && layout
      ? createPortal(
          <div
            data-spotlight-popup={layout.placement.location}
            className="fixed z-[70]"
            style={{
              ...overlayPosition(
                layout.placement,
                layout.geometry.target,
                layout.geometry.viewport
              ),
              maxWidth: layout.placement.maxWidth,
              maxHeight: layout.placement.maxHeight,
            }}
          >
            <motion.div
              animate={{ rotate: options.wiggle ? WIGGLE : 0 }}
              transition={
                options.wiggle
                  ? { duration: options.period / 1000, repeat: Infinity, ease: "easeInOut" }
                  : { duration: 0 }
              }
            >
              <div
                role="button"
                tabIndex={0}
                onClick={dismiss}
                className="flex cursor-pointer items-center gap-2 p-4 shadow-modal"
                style={{
                  backgroundColor: options.backgroundColor ?? theme.background,
                  color: options.foregroundColor ?? theme.foreground,
                  borderRadius: cssRadius(layout.placement.borderRadius),
                }}
              >
                {options.indicator === "arrow" && layout.placement.arrowLeading && (
                  <IndicatorIcon indicator="arrow" arrow={layout.placement.arrow} />
                )}
                <div className="min-w-0 flex-1 overflow-auto">{content}</div>
                {options.indicator === "arrow" && !layout.placement.arrowLeading && (
                  <IndicatorIcon indicator="arrow" arrow={layout.placement.arrow} />
                )}
                {options.indicator === "check" && (
                  <IndicatorIcon indicator="check" arrow={layout.placement.arrow} />
                )}
              </div>
            </motion.div>
          </div>,
          document.body
        )
      : null;

  return (
    <div ref={targetRef} className={cn("inline-block", className)}>
      {children}
      {overlay}
    </div>
  );
}
