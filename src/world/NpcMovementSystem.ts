import { hashSeed } from "../core/engine/seededRoll";
import { reportDiagnostic } from "../core/logging/diagnostics";
import { createLogger } from "../core/logging/logger";
import type { OutputView } from "../core/view/OutputView";
import type { MovementTiming, Npc, NpcId, NpcMovement, RoomId, WorldState } from "../types/engine";

export interface NpcMove {
  npc: NpcId;
  from: RoomId | null;
  to: RoomId;
}

const logger = createLogger("NpcMovement");

export class NpcMovementSystem {
  isDue(timing: MovementTiming, turn: number): boolean {
    if (timing.kind === "onTurn") return timing.turn === turn;
    return timing.turns > 0 && turn % timing.turns === 0;
  }

  advance(world: WorldState, view: OutputView): NpcMove[] {
    const moves: NpcMove[] = [];
    for (const npc of Object.values(world.npcs)) {
      const { movement } = npc;
      if (!movement || !movement.active || npc.health.deceased) continue;
      if (!this.isDue(movement.timing, world.turnCount)) continue;

      const target = this.nextRoom(world, npc, movement);
      if (target === null || target === npc.location) continue;
      if (!world.rooms[target]) {
        reportDiagnostic(world, "missing-entity", `npc ${npc.id}`, `movement target room "${target}" does not exist`);
        continue;
      }

      const from = npc.location;
      npc.location = target;
      movement.lastMovedTurn = world.turnCount;
      moves.push({ npc: npc.id, from, to: target });
      logger.debug(`${npc.id} moved ${from ?? "nowhere"} -> ${target}`);

      if (from === world.player.location) view.push("movement", `${npc.name} leaves.`);
      if (target === world.player.location) view.push("movement", `${npc.name} arrives.`);
    }
    return moves;
  }

  private nextRoom(world: WorldState, npc: Npc, movement: NpcMovement): RoomId | null {
    const { pattern } = movement;
    if (pattern.rooms.length === 0) return null;
    if (pattern.kind === "randomSet") {
      const pick = hashSeed(`${world.meta.seed}:${npc.id}:${world.turnCount}`) % pattern.rooms.length;
      return pattern.rooms[pick] ?? null;
    }
    const next = pattern.index + 1;
    if (next < pattern.rooms.length) {
      pattern.index = next;
    } else if (pattern.loop) {
      pattern.index = 0;
    } else {
      return null;
    }
    return pattern.rooms[pattern.index] ?? null;
  }
}
