import type { LayoutGeometry, PlacementResult } from "@/types/spotlight";
import { measureSpace, resolvePlacement } from "./placement";

export interface PlacementSchedulerOptions {
  /** Reads live geometry. Returns null when the target is no longer on screen. */
  measure: () => LayoutGeometry | null;
  onPlacement: (placement: PlacementResult, geometry: LayoutGeometry) => void;
}

export interface PlacementScheduler {
  /** Queues a placement to run at the next `layoutReady`. */
  request(): void;
  /** Called by the host once layout has settled. */
  layoutReady(): void;
  cancel(): void;
  /** Stops the scheduler for good, e.g. when the widget unmounts. */
  detach(): void;
  readonly pending: boolean;
  readonly attached: boolean;
}

/**
 * Geometry is only valid after layout, so placement runs in two steps:
 * `request` when the popup should appear, then `layoutReady` from the host's
 * post-layout hook.
 */
export function createPlacementScheduler({
  measure,
  onPlacement,
}: PlacementSchedulerOptions): PlacementScheduler {
  let pending = false;
  let attached = true;

  return {
    request() {
      if (attached) pending = true;
    },
    layoutReady() {
      if (!attached || !pending) return;
      pending = false;
      const geometry = measure();
      if (!geometry) return;
      onPlacement(resolvePlacement(measureSpace(geometry)), geometry);
    },
    cancel() {
      pending = false;
    },
    detach() {
      pending = false;
      attached = false;
    },
    get pending() {
      return pending;
    },
    get attached() {
      return attached;
    },
  };
}
