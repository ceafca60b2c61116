import { z } from "zod";
import { SpotlightError } from "./errors";

export const popupOptionsSchema = z.object({
  /** Falls back to the provider theme when absent */
  backgroundColor: z.string().min(1).optional(),
  foregroundColor: z.string().min(1).optional(),
  /** Periodic shake that draws attention to the popup */
  wiggle: z.boolean().default(true),
  /** Wiggle period in milliseconds */
  period: z.number().int().positive().default(1000),
  indicator: z.enum(["none", "check", "arrow"]).default("none"),
});

export type PopupOptionsInput = z.input<typeof popupOptionsSchema>;
export type PopupOptions = z.output<typeof popupOptionsSchema>;

export function resolvePopupOptions(input: PopupOptionsInput = {}): PopupOptions {
  const parsed = popupOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SpotlightError(`invalid popup options: ${fields}`);
  }
  return parsed.data;
}
