import { ENGINE_DEFAULTS } from "../../config";
import { createLogger } from "../logging/logger";
import { normalizeSnapshot } from "../validation/snapshotValidation";
import type { EngineSnapshot } from "./snapshot";

export interface SaveStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

const logger = createLogger("SaveStateManager");

export function createMemoryStorage(): SaveStorage {
  const store = new Map<string, string>();
  return {
    getItem: (key) => store.get(key) ?? null,
    setItem: (key, value) => {
      store.set(key, value);
    },
    removeItem: (key) => {
      store.delete(key);
    }
  };
}

export class SaveStateManager {
  constructor(private readonly storage: SaveStorage, private readonly key: string = ENGINE_DEFAULTS.saveKey) {}

  save(snapshot: EngineSnapshot): void {
    const payload: EngineSnapshot = { ...snapshot, savedAt: new Date().toISOString() };
    this.storage.setItem(this.key, JSON.stringify(payload));
  }

  load(): EngineSnapshot | null {
    const raw = this.storage.getItem(this.key);
    if (!raw) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.error(`Save under "${this.key}" is not valid JSON`, { err });
      return null;
    }
    const snapshot = normalizeSnapshot(parsed);
    if (!snapshot) logger.warn(`Save under "${this.key}" has an unexpected shape`);
    return snapshot;
  }

  clear(): void {
    this.storage.removeItem(this.key);
  }
}
