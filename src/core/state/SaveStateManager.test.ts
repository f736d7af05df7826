import { describe, expect, it } from "vitest";
import { GameEngine } from "../../app/GameEngine";
import { testBundle } from "../../testing/testBundle";
import { createMemoryStorage, SaveStateManager } from "./SaveStateManager";

describe("SaveStateManager", () => {
  it("saves and restores an engine snapshot", () => {
    const storage = createMemoryStorage();
    const manager = new SaveStateManager(storage, "slot-1");
    const engine = new GameEngine(testBundle(), { config: { logLevel: "silent" } });
    engine.getWorld().player.score = 3;

    manager.save(engine.snapshot());
    const loaded = manager.load();

    expect(loaded).not.toBeNull();
    expect(loaded?.world.meta.seed).toBe("test-seed");
    expect(loaded?.world.player.score).toBe(3);
    expect(typeof loaded?.savedAt).toBe("string");
  });

  it("returns null for malformed or invalid save payloads", () => {
    const storage = createMemoryStorage();
    const manager = new SaveStateManager(storage, "slot-1");
    expect(manager.load()).toBeNull();
    storage.setItem("slot-1", JSON.stringify({ bad: "shape" }));
    expect(manager.load()).toBeNull();
    storage.setItem("slot-1", "{not json");
    expect(manager.load()).toBeNull();
  });

  it("clears its slot", () => {
    const storage = createMemoryStorage();
    const manager = new SaveStateManager(storage);
    storage.setItem("taletick_autosave", "{}");
    manager.clear();
    expect(storage.getItem("taletick_autosave")).toBeNull();
  });
});
