import type { WorldBundle } from "../../content/bundleSchema";
import type { HealthState, Item, Npc, Room, WorldState } from "../../types/engine";

function freshHealth(maxHp: number): HealthState {
  return { maxHp, currentHp: maxHp, deceased: false, effects: [] };
}

export function createWorldState(bundle: WorldBundle, seed = bundle.meta.seed): WorldState {
  const rooms: Record<string, Room> = {};
  bundle.rooms.forEach((room) => {
    rooms[room.id] = {
      id: room.id,
      name: room.name,
      description: room.description,
      visited: room.visited,
      exits: structuredClone(room.exits)
    };
  });
  const start = rooms[bundle.player.start];
  if (start) start.visited = true;

  const items: Record<string, Item> = {};
  bundle.items.forEach((item) => {
    items[item.id] = structuredClone(item);
  });

  const npcs: Record<string, Npc> = {};
  bundle.npcs.forEach((npc) => {
    npcs[npc.id] = {
      id: npc.id,
      name: npc.name,
      description: npc.description,
      location: npc.location,
      state: npc.state,
      dialogue: structuredClone(npc.dialogue),
      health: freshHealth(npc.maxHp),
      movement: npc.movement
        ? {
          pattern: npc.movement.pattern.kind === "route"
            ? { kind: "route", rooms: [...npc.movement.pattern.rooms], index: 0, loop: npc.movement.pattern.loop }
            : { kind: "randomSet", rooms: [...npc.movement.pattern.rooms] },
          timing: { ...npc.movement.timing },
          active: npc.movement.active,
          lastMovedTurn: null
        }
        : null
    };
  });

  return {
    meta: { title: bundle.meta.title, version: bundle.meta.version, seed },
    turnCount: 0,
    clock: { lastProcessedTurn: 0 },
    rng: { counter: 0 },
    player: {
      name: bundle.player.name,
      location: bundle.player.start,
      flags: {},
      score: 0,
      health: freshHealth(bundle.player.maxHp)
    },
    rooms,
    items,
    npcs,
    goals: Object.fromEntries(bundle.goals.map((goal) => [goal.id, structuredClone(goal)])),
    spinners: structuredClone(bundle.spinners),
    diagnostics: []
  };
}
