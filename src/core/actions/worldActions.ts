import type {
  DiagnosticCode,
  ExitState,
  Flag,
  HealthState,
  Item,
  ItemId,
  ItemLocation,
  Npc,
  NpcId,
  Room,
  RoomId,
  WorldState
} from "../../types/engine";

export class ActionFailure extends Error {
  constructor(readonly code: DiagnosticCode, message: string) {
    super(message);
    this.name = "ActionFailure";
  }
}

export function requireRoom(world: WorldState, id: RoomId): Room {
  const room = world.rooms[id];
  if (!room) throw new ActionFailure("missing-entity", `room "${id}" does not exist`);
  return room;
}

export function requireItem(world: WorldState, id: ItemId): Item {
  const item = world.items[id];
  if (!item) throw new ActionFailure("missing-entity", `item "${id}" does not exist`);
  return item;
}

export function requireNpc(world: WorldState, id: NpcId): Npc {
  const npc = world.npcs[id];
  if (!npc) throw new ActionFailure("missing-entity", `npc "${id}" does not exist`);
  return npc;
}

export function requireExit(world: WorldState, from: RoomId, direction: string): ExitState {
  const exit = requireRoom(world, from).exits[direction];
  if (!exit) throw new ActionFailure("missing-entity", `room "${from}" has no exit "${direction}"`);
  return exit;
}

export function requireFlag(world: WorldState, name: string): Flag {
  const flag = world.player.flags[name];
  if (!flag) throw new ActionFailure("missing-entity", `flag "${name}" is not set`);
  return flag;
}

export function healthOf(world: WorldState, npcId?: NpcId): HealthState {
  return npcId === undefined ? world.player.health : requireNpc(world, npcId).health;
}

// An item may not end up inside itself, directly or through nested containers.
function wouldNest(world: WorldState, item: ItemId, container: ItemId): boolean {
  let cursor: ItemId | null = container;
  const seen = new Set<ItemId>();
  while (cursor !== null && !seen.has(cursor)) {
    if (cursor === item) return true;
    seen.add(cursor);
    const location: ItemLocation | undefined = world.items[cursor]?.location;
    cursor = location?.kind === "container" ? location.container : null;
  }
  return false;
}

export function placeItem(world: WorldState, id: ItemId, location: ItemLocation): Item {
  const item = requireItem(world, id);
  switch (location.kind) {
    case "room":
      requireRoom(world, location.room);
      break;
    case "npc":
      requireNpc(world, location.npc);
      break;
    case "container": {
      const container = requireItem(world, location.container);
      if (container.container === null) {
        throw new ActionFailure("invalid-target", `item "${container.id}" is not a container`);
      }
      if (wouldNest(world, id, location.container)) {
        throw new ActionFailure("invalid-target", `item "${id}" cannot be placed inside itself`);
      }
      break;
    }
    default:
      break;
  }
  item.location = location;
  return item;
}

export function setFlag(world: WorldState, name: string, sequence?: { end?: number }): Flag {
  const flag: Flag = {
    name,
    turnSet: world.turnCount,
    sequence: sequence ? { step: 0, end: sequence.end ?? null } : null
  };
  world.player.flags[name] = flag;
  return flag;
}

export function advanceFlag(world: WorldState, name: string): Flag {
  const flag = requireFlag(world, name);
  if (!flag.sequence) throw new ActionFailure("invalid-target", `flag "${name}" is not a sequence`);
  const { end } = flag.sequence;
  if (end === null || flag.sequence.step < end) flag.sequence.step += 1;
  return flag;
}

export function resetFlag(world: WorldState, name: string): Flag {
  const flag = requireFlag(world, name);
  if (flag.sequence) flag.sequence.step = 0;
  flag.turnSet = world.turnCount;
  return flag;
}

export function removeFlag(world: WorldState, name: string): void {
  requireFlag(world, name);
  delete world.player.flags[name];
}

export function setContainerLock(world: WorldState, id: ItemId, locked: boolean): Item {
  const item = requireItem(world, id);
  if (item.container === null) throw new ActionFailure("invalid-target", `item "${id}" cannot be locked`);
  item.container = locked ? "locked" : "closed";
  return item;
}

export function applyHealthChange(health: HealthState, delta: number): number {
  const before = health.currentHp;
  health.currentHp = Math.min(health.maxHp, Math.max(0, health.currentHp + delta));
  return health.currentHp - before;
}
