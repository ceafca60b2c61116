import type { PopupId } from "@/types/spotlight";
import { DuplicatePageError, LookupError } from "./errors";
import type { VisibilityHandle } from "./observable-value";
import { PopupSequencer } from "./popup-sequencer";

export type DuplicatePagePolicy = "reject" | "replace";

export interface PopupManagerOptions {
  /** Ids already seen in an earlier session, e.g. loaded from storage */
  seen?: readonly PopupId[] | ReadonlySet<PopupId>;
  /** Called once per dismissed popup, after it joins the seen set */
  onSeen?: (id: PopupId) => void;
  /**
   * What `addPage` does with a name that is already registered. "replace"
   * disposes the old page first.
   */
  duplicatePages?: DuplicatePagePolicy;
}

/**
 * Hands out visibility handles for popups grouped into pages. Each page shows
 * its popups one by one as the user dismisses them; ids in the shared seen
 * set are skipped on every page.
 *
 * Call `discover` once a page is on screen, and `dispose` when finished.
 */
export class PopupManager {
  private pages: Map<string, PopupSequencer> = new Map();
  private seen: Set<PopupId>;
  private onSeen?: (id: PopupId) => void;
  private duplicatePages: DuplicatePagePolicy;

  constructor({ seen = [], onSeen, duplicatePages = "reject" }: PopupManagerOptions = {}) {
    this.seen = new Set(seen);
    this.onSeen = onSeen;
    this.duplicatePages = duplicatePages;
  }

  addPage(name: string, ids: readonly PopupId[]): this {
    const existing = this.pages.get(name);
    if (existing) {
      if (this.duplicatePages === "reject") throw new DuplicatePageError(name);
      existing.dispose();
    }

    this.pages.set(
      name,
      new PopupSequencer({
        page: name,
        ids,
        isSeen: (id) => this.seen.has(id),
        onDismiss: (id) => this.markSeen(id),
      })
    );
    return this;
  }

  /** Shows the first unseen popup of a page. Unknown pages are ignored. */
  discover(name: string): PopupId | undefined {
    return this.pages.get(name)?.activateNext();
  }

  notifier(name: string, id: PopupId): VisibilityHandle {
    const page = this.pages.get(name);
    if (!page) throw new LookupError("page", name);
    const handle = page.handle(id);
    if (!handle) throw new LookupError("id", name, id);
    return handle;
  }

  hasPage(name: string): boolean {
    return this.pages.has(name);
  }

  pageNames(): string[] {
    return [...this.pages.keys()];
  }

  current(name: string): PopupId | undefined {
    return this.pages.get(name)?.current();
  }

  isSeen(id: PopupId): boolean {
    return this.seen.has(id);
  }

  seenIds(): PopupId[] {
    return [...this.seen];
  }

  dispose() {
    for (const page of this.pages.values()) page.dispose();
    this.pages.clear();
  }

  private markSeen(id: PopupId) {
    this.seen.add(id);
    if (!this.onSeen) return;
    try {
      this.onSeen(id);
    } catch (err) {
      // The next popup still has to show
      console.error("[popup-manager] onSeen callback failed:", err);
    }
  }
}
