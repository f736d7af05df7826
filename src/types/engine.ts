export type RoomId = string;
export type ItemId = string;
export type NpcId = string;
export type GoalId = string;
export type SpinnerId = string;
export type TriggerId = string;
export type EventId = number;

export type EventKind =
  | "always"
  | "enterRoom"
  | "leaveRoom"
  | "takeItem"
  | "dropItem"
  | "lookAtItem"
  | "openItem"
  | "unlockItem"
  | "touchItem"
  | "talkToNpc"
  | "useItem"
  | "useItemOnItem"
  | "giveToNpc"
  | "takeFromNpc"
  | "insertItemInto"
  | "ingest"
  | "playerDeath"
  | "npcDeath";

export type EventParams = Record<string, string>;

export interface GameEvent {
  kind: EventKind;
  params?: EventParams;
}

export interface EventMatcher {
  kind: EventKind;
  params?: EventParams;
}

export type Condition =
  | { kind: "all"; children: Condition[] }
  | { kind: "any"; children: Condition[] }
  | { kind: "hasFlag"; flag: string }
  | { kind: "missingFlag"; flag: string }
  | { kind: "flagInProgress"; flag: string }
  | { kind: "flagComplete"; flag: string }
  | { kind: "hasItem"; item: ItemId }
  | { kind: "missingItem"; item: ItemId }
  | { kind: "hasVisited"; room: RoomId }
  | { kind: "reachedRoom"; room: RoomId }
  | { kind: "playerInRoom"; room: RoomId }
  | { kind: "withNpc"; npc: NpcId }
  | { kind: "npcHasItem"; npc: NpcId; item: ItemId }
  | { kind: "npcInState"; npc: NpcId; state: string }
  | { kind: "containerHasItem"; container: ItemId; item: ItemId }
  | { kind: "goalComplete"; goal: GoalId }
  | { kind: "eventMatches"; event: EventMatcher }
  | { kind: "chancePercent"; percent: number }
  | { kind: "turnAtLeast"; turn: number };

export type CompositeCondition = Extract<Condition, { kind: "all" | "any" }>;
export type LeafCondition = Exclude<Condition, CompositeCondition>;

export type OnFalsePolicy =
  | { kind: "cancel" }
  | { kind: "retryAfter"; turns: number }
  | { kind: "retryNextTurn" };

export interface ScheduleOptions {
  actions: Action[];
  condition?: Condition;
  onFalse?: OnFalsePolicy;
  note?: string;
}

export type Action =
  | { kind: "showMessage"; text: string }
  | { kind: "addFlag"; flag: string; sequence?: { end?: number } }
  | { kind: "advanceFlag"; flag: string }
  | { kind: "removeFlag"; flag: string }
  | { kind: "resetFlag"; flag: string }
  | { kind: "awardPoints"; amount: number; reason?: string }
  | { kind: "spawnItemInRoom"; item: ItemId; room: RoomId }
  | { kind: "spawnItemCurrentRoom"; item: ItemId }
  | { kind: "spawnItemInInventory"; item: ItemId }
  | { kind: "spawnItemInContainer"; item: ItemId; container: ItemId }
  | { kind: "despawnItem"; item: ItemId }
  | { kind: "giveItemToPlayer"; npc: NpcId; item: ItemId }
  | { kind: "pushPlayerTo"; room: RoomId }
  | { kind: "revealExit"; from: RoomId; to: RoomId; direction: string }
  | { kind: "lockExit"; from: RoomId; direction: string }
  | { kind: "unlockExit"; from: RoomId; direction: string }
  | { kind: "setBarredMessage"; from: RoomId; direction: string; message: string }
  | { kind: "lockItem"; item: ItemId }
  | { kind: "unlockItem"; item: ItemId }
  | { kind: "setItemDescription"; item: ItemId; text: string }
  | { kind: "setNpcState"; npc: NpcId; state: string }
  | { kind: "npcSays"; npc: NpcId; quote: string }
  | { kind: "npcSaysRandom"; npc: NpcId }
  | { kind: "setNpcActive"; npc: NpcId; active: boolean }
  | { kind: "spinnerMessage"; spinner: SpinnerId }
  | { kind: "damage"; amount: number; cause: string; turns?: number; npc?: NpcId }
  | { kind: "heal"; amount: number; cause: string; turns?: number; npc?: NpcId }
  | { kind: "removeEffect"; cause: string; npc?: NpcId }
  | { kind: "setTriggerEnabled"; trigger: TriggerId; enabled: boolean }
  | ({ kind: "scheduleIn"; turns: number } & ScheduleOptions)
  | ({ kind: "scheduleAt"; turn: number } & ScheduleOptions)
  | ({ kind: "scheduleEvery"; every: number; times?: number } & ScheduleOptions);

export type ActionKind = Action["kind"];

export interface TriggerDefinition {
  id: TriggerId;
  name: string;
  note?: string;
  event: EventMatcher;
  condition: Condition;
  actions: Action[];
  fireOnce: boolean;
  enabled: boolean;
}

export interface TriggerRuntimeState {
  enabled: boolean;
  fired: boolean;
  hasFired: boolean;
  fireCount: number;
  lastFiredTurn: number | null;
}

export interface EventOrigin {
  triggerId: TriggerId | null;
  parentEventId: EventId | null;
}

export interface Recurrence {
  every: number;
  remaining: number | null;
}

export interface ScheduledEvent {
  id: EventId;
  dueTurn: number;
  scheduledTurn: number;
  condition: Condition | null;
  actions: Action[];
  onFalse: OnFalsePolicy;
  origin: EventOrigin;
  note: string | null;
  recurrence: Recurrence | null;
}

export type EventStatus = "pending" | "fired" | "cancelled" | "rescheduled";
export type TerminalStatus = Exclude<EventStatus, "pending">;

export interface Tombstone {
  eventId: EventId;
  status: TerminalStatus;
  dueTurn: number;
  resolvedTurn: number;
  nextEventId: EventId | null;
  note: string | null;
  originTriggerId: TriggerId | null;
}

export interface SchedulerSnapshot {
  nextId: EventId;
  pending: ScheduledEvent[];
  tombstones: Tombstone[];
}

export interface Flag {
  name: string;
  turnSet: number;
  sequence: { step: number; end: number | null } | null;
}

export interface HealthEffect {
  kind: "damageOverTime" | "healOverTime";
  cause: string;
  amount: number;
  remaining: number;
}

export interface HealthState {
  maxHp: number;
  currentHp: number;
  deceased: boolean;
  effects: HealthEffect[];
}

export interface ExitState {
  to: RoomId;
  hidden: boolean;
  locked: boolean;
  barredMessage: string | null;
}

export interface Room {
  id: RoomId;
  name: string;
  description: string;
  exits: Record<string, ExitState>;
  visited: boolean;
}

export type ItemLocation =
  | { kind: "room"; room: RoomId }
  | { kind: "inventory" }
  | { kind: "npc"; npc: NpcId }
  | { kind: "container"; container: ItemId }
  | { kind: "nowhere" };

export type ContainerState = "open" | "closed" | "locked";

export interface Item {
  id: ItemId;
  name: string;
  description: string;
  location: ItemLocation;
  container: ContainerState | null;
}

export type MovementPattern =
  | { kind: "route"; rooms: RoomId[]; index: number; loop: boolean }
  | { kind: "randomSet"; rooms: RoomId[] };

export type MovementTiming =
  | { kind: "everyNTurns"; turns: number }
  | { kind: "onTurn"; turn: number };

export interface NpcMovement {
  pattern: MovementPattern;
  timing: MovementTiming;
  active: boolean;
  lastMovedTurn: number | null;
}

export interface Npc {
  id: NpcId;
  name: string;
  description: string;
  location: RoomId | null;
  state: string;
  dialogue: Record<string, string[]>;
  movement: NpcMovement | null;
  health: HealthState;
}

export type GoalGroup = "required" | "optional" | "statusEffect";
export type GoalStatus = "inactive" | "active" | "complete" | "failed";

export interface Goal {
  id: GoalId;
  name: string;
  description: string;
  group: GoalGroup;
  activateWhen: Condition | null;
  finishedWhen: Condition;
  failedWhen: Condition | null;
}

export interface SpinnerWedge {
  text: string;
  weight: number;
}

export type DiagnosticCode =
  | "missing-entity"
  | "invalid-target"
  | "policy-clamped"
  | "schedule-clamped"
  | "illegal-transition";

export interface Diagnostic {
  code: DiagnosticCode;
  source: string;
  message: string;
  turn: number;
}

export interface PlayerState {
  name: string;
  location: RoomId;
  flags: Record<string, Flag>;
  score: number;
  health: HealthState;
}

export interface WorldState {
  meta: {
    title: string;
    version: string;
    seed: string;
  };
  turnCount: number;
  clock: {
    lastProcessedTurn: number;
  };
  rng: {
    counter: number;
  };
  player: PlayerState;
  rooms: Record<RoomId, Room>;
  items: Record<ItemId, Item>;
  npcs: Record<NpcId, Npc>;
  goals: Record<GoalId, Goal>;
  spinners: Record<SpinnerId, SpinnerWedge[]>;
  diagnostics: Diagnostic[];
}

export type OutputTag =
  | "triggered"
  | "ambient"
  | "success"
  | "failure"
  | "error"
  | "dialogue"
  | "engine"
  | "points"
  | "health"
  | "movement";

export interface OutputItem {
  tag: OutputTag;
  text: string;
  speaker?: string;
}
