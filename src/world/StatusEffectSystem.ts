import { applyHealthChange } from "../core/actions/worldActions";
import { formatHealthChange } from "../core/logging/format";
import { createLogger } from "../core/logging/logger";
import type { OutputView } from "../core/view/OutputView";
import type { GameEvent, HealthEffect, HealthState, WorldState } from "../types/engine";

const logger = createLogger("StatusEffects");

export class StatusEffectSystem {
  tick(world: WorldState, view: OutputView): GameEvent[] {
    const deaths: GameEvent[] = [];
    if (this.tickHealth(world.player.health, world.player.name, view)) {
      deaths.push({ kind: "playerDeath" });
    }
    for (const npc of Object.values(world.npcs)) {
      if (this.tickHealth(npc.health, npc.name, view)) {
        deaths.push({ kind: "npcDeath", params: { npc: npc.id } });
      }
    }
    return deaths;
  }

  private tickHealth(health: HealthState, name: string, view: OutputView): boolean {
    const remaining: HealthEffect[] = [];
    for (const effect of health.effects) {
      const change = applyHealthChange(health, effect.kind === "damageOverTime" ? -effect.amount : effect.amount);
      view.push("health", formatHealthChange(name, change, effect.cause));
      if (effect.remaining > 1) remaining.push({ ...effect, remaining: effect.remaining - 1 });
    }
    health.effects = remaining;
    return this.checkDeath(health, name);
  }

  checkDeath(health: HealthState, name: string): boolean {
    if (health.currentHp > 0) {
      health.deceased = false;
      return false;
    }
    if (health.deceased) return false;
    health.deceased = true;
    logger.info(`${name} died`);
    return true;
  }
}
