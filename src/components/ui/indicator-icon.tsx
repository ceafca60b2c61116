import {
  ArrowDownLeft,
  ArrowDownRight,
  ArrowUpLeft,
  ArrowUpRight,
  Check,
  type LucideIcon,
  type LucideProps,
} from "lucide-react";
import type { Corner, PopupIndicator } from "@/types/spotlight";
import { cn } from "@/lib/utils";

const ARROWS: Record<Corner, LucideIcon> = {
  "top-left": ArrowUpLeft,
  "top-right": ArrowUpRight,
  "bottom-left": ArrowDownLeft,
  "bottom-right": ArrowDownRight,
};

interface IndicatorIconProps extends Omit<LucideProps, "ref"> {
  indicator: Exclude<PopupIndicator, "none">;
  /** Corner the arrow points toward */
  arrow: Corner;
}

export function IndicatorIcon({ indicator, arrow, className, ...props }: IndicatorIconProps) {
  const Glyph = indicator === "check" ? Check : ARROWS[arrow];
  return (
    <Glyph
      size={16}
      strokeWidth={1.5}
      aria-hidden="true"
      data-indicator={indicator === "check" ? "check" : `arrow-${arrow}`}
      className={cn("shrink-0", className)}
      {...props}
    />
  );
}
