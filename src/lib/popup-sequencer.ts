import type { PopupId } from "@/types/spotlight";
import { DuplicatePopupError } from "./errors";
import { ObservableValue, type VisibilityHandle } from "./observable-value";

export interface PopupSequencerOptions {
  page: string;
  ids: readonly PopupId[];
  isSeen: (id: PopupId) => boolean;
  onDismiss: (id: PopupId) => void;
}

/**
 * Shows the popups of one page one at a time, in declared order, skipping
 * ids that are already seen. Nothing is shown until `activateNext` runs.
 */
export class PopupSequencer {
  readonly page: string;
  private handles: Map<PopupId, VisibilityHandle> = new Map();
  private unsubscribers: (() => void)[] = [];
  private isSeen: (id: PopupId) => boolean;
  private onDismiss: (id: PopupId) => void;

  constructor({ page, ids, isSeen, onDismiss }: PopupSequencerOptions) {
    this.page = page;
    this.isSeen = isSeen;
    this.onDismiss = onDismiss;

    for (const id of ids) {
      if (this.handles.has(id)) throw new DuplicatePopupError(page, id);
      this.handles.set(id, new ObservableValue(false));
    }

    for (const [id, handle] of this.handles) {
      this.unsubscribers.push(
        handle.subscribe((visible) => {
          if (!visible) this.dismissed(id);
        })
      );
    }
  }

  get ids(): PopupId[] {
    return [...this.handles.keys()];
  }

  handle(id: PopupId): VisibilityHandle | undefined {
    return this.handles.get(id);
  }

  /** The id whose popup is visible right now, if any. */
  current(): PopupId | undefined {
    for (const [id, handle] of this.handles) {
      if (handle.get()) return id;
    }
    return undefined;
  }

  /**
   * Shows the first unseen popup. A popup that is already visible stays the
   * active one; when every id is seen nothing changes.
   */
  activateNext(): PopupId | undefined {
    const visible = this.current();
    if (visible !== undefined) return visible;

    const next = this.firstUnseen();
    if (next === undefined) return undefined;
    this.handles.get(next)?.set(true);
    return next;
  }

  dispose() {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    for (const handle of this.handles.values()) handle.dispose();
  }

  private firstUnseen(): PopupId | undefined {
    for (const id of this.handles.keys()) {
      if (!this.isSeen(id)) return id;
    }
    return undefined;
  }

  private dismissed(id: PopupId) {
    this.onDismiss(id);
    this.activateNext();
  }
}
