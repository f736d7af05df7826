import { describe, expect, it } from "vitest";
import { OutputView } from "../core/view/OutputView";
import { createTestWorld } from "../testing/testBundle";
import { StatusEffectSystem } from "./StatusEffectSystem";

describe("StatusEffectSystem", () => {
  it("counts lasting effects down each tick", () => {
    const world = createTestWorld();
    const view = new OutputView();
    const system = new StatusEffectSystem();
    world.player.health.effects = [{ kind: "damageOverTime", cause: "poison", amount: 1, remaining: 2 }];

    system.tick(world, view);
    expect(world.player.health.currentHp).toBe(9);
    expect(world.player.health.effects).toEqual([{ kind: "damageOverTime", cause: "poison", amount: 1, remaining: 1 }]);

    system.tick(world, view);
    expect(world.player.health.currentHp).toBe(8);
    expect(world.player.health.effects).toEqual([]);
    expect(view.pending().map((item) => item.text)).toEqual(["You: -1 hp (poison)", "You: -1 hp (poison)"]);
  });

  it("caps healing at maximum health", () => {
    const world = createTestWorld();
    const view = new OutputView();
    world.player.health.currentHp = 9;
    world.player.health.effects = [{ kind: "healOverTime", cause: "rest", amount: 5, remaining: 1 }];
    new StatusEffectSystem().tick(world, view);
    expect(world.player.health.currentHp).toBe(10);
    expect(view.pending()).toEqual([{ tag: "health", text: "You: +1 hp (rest)" }]);
  });

  it("reports an npc death a single time", () => {
    const world = createTestWorld();
    const view = new OutputView();
    const system = new StatusEffectSystem();
    const keeper = world.npcs.keeper;
    if (!keeper) throw new Error("keeper missing from test world");
    keeper.health.currentHp = 1;
    keeper.health.effects = [{ kind: "damageOverTime", cause: "gloom", amount: 1, remaining: 3 }];

    expect(system.tick(world, view)).toEqual([{ kind: "npcDeath", params: { npc: "keeper" } }]);
    expect(system.tick(world, view)).toEqual([]);
    expect(keeper.health.deceased).toBe(true);
  });
});
