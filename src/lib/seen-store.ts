import { z } from "zod";
import type { PopupId } from "@/types/spotlight";

const storedSeenSchema = z.array(z.string());

export interface SeenStore {
  load(): PopupId[];
  markSeen(id: PopupId): void;
  clear(): void;
}

/** The slice of the Web Storage API the store needs. */
export type SeenStorage = Pick<Storage, "getItem" | "setItem" | "removeItem">;

export function seenKey(namespace: string) {
  return `spotlight_seen_${namespace}`;
}

/**
 * Persists dismissed popup ids between sessions. Pair `load` with the
 * manager's `seen` option and `markSeen` with its `onSeen` callback.
 */
export function createSeenStore(
  namespace: string,
  storage: SeenStorage = localStorage
): SeenStore {
  const key = seenKey(namespace);

  function load(): PopupId[] {
    const raw = storage.getItem(key);
    if (raw === null) return [];
    try {
      const parsed = storedSeenSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      console.error(`[seen-store] Ignoring malformed value for ${key}:`, parsed.error);
    } catch (err) {
      console.error(`[seen-store] Ignoring unparseable value for ${key}:`, err);
    }
    return [];
  }

  return {
    load,
    markSeen(id) {
      const seen = load();
      if (seen.includes(id)) return;
      try {
        storage.setItem(key, JSON.stringify([...seen, id]));
      } catch (err) {
        console.error(`[seen-store] Failed to persist ${id}:`, err);
      }
    },
    clear() {
      storage.removeItem(key);
    },
  };
}
