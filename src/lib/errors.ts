import type { PopupId } from "@/types/spotlight";

export class SpotlightError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpotlightError";
  }
}

export type LookupKind = "page" | "id";

/** Raised when a notifier is requested for a page or id that was never registered. */
export class LookupError extends SpotlightError {
  readonly kind: LookupKind;
  readonly page: string;
  readonly id: PopupId | null;

  constructor(kind: LookupKind, page: string, id: PopupId | null = null) {
    super(
      kind === "page"
        ? `no such page: ${page}`
        : `no such id: ${id ?? ""} on page ${page}`
    );
    this.name = "LookupError";
    this.kind = kind;
    this.page = page;
    this.id = id;
  }
}

export class DuplicatePageError extends SpotlightError {
  readonly page: string;

  constructor(page: string) {
    super(`page already registered: ${page}`);
    this.name = "DuplicatePageError";
    this.page = page;
  }
}

export class DuplicatePopupError extends SpotlightError {
  readonly page: string;
  readonly id: PopupId;

  constructor(page: string, id: PopupId) {
    super(`popup id listed twice on page ${page}: ${id}`);
    this.name = "DuplicatePopupError";
    this.page = page;
    this.id = id;
  }
}
