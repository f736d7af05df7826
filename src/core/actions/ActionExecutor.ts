import type { Action, EventOrigin, OnFalsePolicy, ScheduleOptions, WorldState } from "../../types/engine";
import { nextRoll, pickWeighted } from "../engine/seededRoll";
import { formatHealthChange } from "../logging/format";
import { reportDiagnostic } from "../logging/diagnostics";
import { createLogger } from "../logging/logger";
import type { OutputView } from "../view/OutputView";
import { NO_ORIGIN, type ActionRunner, type ScheduleSink, type TriggerSwitch } from "./contracts";
import {
  ActionFailure,
  advanceFlag,
  applyHealthChange,
  healthOf,
  placeItem,
  removeFlag,
  requireExit,
  requireItem,
  requireNpc,
  requireRoom,
  resetFlag,
  setContainerLock,
  setFlag
} from "./worldActions";

export interface ActionExecutorDeps {
  scheduler: ScheduleSink;
  triggers?: TriggerSwitch;
}

export interface ActionOutcome {
  applied: number;
  skipped: number;
}

const DEFAULT_POLICY: OnFalsePolicy = { kind: "cancel" };

const logger = createLogger("ActionExecutor");

export class ActionExecutor implements ActionRunner {
  constructor(private readonly deps: ActionExecutorDeps) {}

  runActions(actions: Action[], world: WorldState, view: OutputView, origin: EventOrigin): void {
    this.execute(actions, world, view, origin);
  }

  execute(actions: Action[], world: WorldState, view: OutputView, origin: EventOrigin = NO_ORIGIN): ActionOutcome {
    const outcome: ActionOutcome = { applied: 0, skipped: 0 };
    for (const action of actions) {
      try {
        this.apply(action, world, view, origin);
        outcome.applied += 1;
        logger.debug(`applied ${action.kind}`, { trigger: origin.triggerId, event: origin.parentEventId });
      } catch (err) {
        if (!(err instanceof ActionFailure)) throw err;
        outcome.skipped += 1;
        reportDiagnostic(world, err.code, originLabel(origin), `${action.kind} skipped: ${err.message}`);
      }
    }
    return outcome;
  }

  private apply(action: Action, world: WorldState, view: OutputView, origin: EventOrigin): void {
    const tag = origin.parentEventId === null ? "triggered" : "ambient";
    switch (action.kind) {
      case "showMessage":
        view.push(tag, action.text);
        return;
      case "addFlag":
        setFlag(world, action.flag, action.sequence);
        return;
      case "advanceFlag":
        advanceFlag(world, action.flag);
        return;
      case "removeFlag":
        removeFlag(world, action.flag);
        return;
      case "resetFlag":
        resetFlag(world, action.flag);
        return;
      case "awardPoints":
        world.player.score += action.amount;
        view.push("points", action.reason ? `${formatPoints(action.amount)} (${action.reason})` : formatPoints(action.amount));
        return;
      case "spawnItemInRoom":
        placeItem(world, action.item, { kind: "room", room: action.room });
        return;
      case "spawnItemCurrentRoom":
        placeItem(world, action.item, { kind: "room", room: world.player.location });
        return;
      case "spawnItemInInventory":
        placeItem(world, action.item, { kind: "inventory" });
        return;
      case "spawnItemInContainer":
        placeItem(world, action.item, { kind: "container", container: action.container });
        return;
      case "despawnItem":
        placeItem(world, action.item, { kind: "nowhere" });
        return;
      case "giveItemToPlayer": {
        requireNpc(world, action.npc);
        const item = requireItem(world, action.item);
        if (item.location.kind !== "npc" || item.location.npc !== action.npc) {
          throw new ActionFailure("invalid-target", `npc "${action.npc}" does not hold "${action.item}"`);
        }
        placeItem(world, action.item, { kind: "inventory" });
        return;
      }
      case "pushPlayerTo": {
        const room = requireRoom(world, action.room);
        world.player.location = room.id;
        room.visited = true;
        return;
      }
      case "revealExit": {
        const from = requireRoom(world, action.from);
        requireRoom(world, action.to);
        const existing = from.exits[action.direction];
        from.exits[action.direction] = existing
          ? { ...existing, to: action.to, hidden: false }
          : { to: action.to, hidden: false, locked: false, barredMessage: null };
        return;
      }
      case "lockExit":
        requireExit(world, action.from, action.direction).locked = true;
        return;
      case "unlockExit":
        requireExit(world, action.from, action.direction).locked = false;
        return;
      case "setBarredMessage":
        requireExit(world, action.from, action.direction).barredMessage = action.message;
        return;
      case "lockItem":
        setContainerLock(world, action.item, true);
        return;
      case "unlockItem":
        setContainerLock(world, action.item, false);
        return;
      case "setItemDescription":
        requireItem(world, action.item).description = action.text;
        return;
      case "setNpcState":
        requireNpc(world, action.npc).state = action.state;
        return;
      case "npcSays": {
        const npc = requireNpc(world, action.npc);
        view.push("dialogue", action.quote, npc.name);
        return;
      }
      case "npcSaysRandom": {
        const npc = requireNpc(world, action.npc);
        const lines = npc.dialogue[npc.state] ?? npc.dialogue.default ?? [];
        if (lines.length === 0) throw new ActionFailure("invalid-target", `npc "${npc.id}" has nothing to say in state "${npc.state}"`);
        const line = lines[Math.floor(nextRoll(world, `npc:${npc.id}`) * lines.length)] ?? lines[0];
        view.push("dialogue", line, npc.name);
        return;
      }
      case "setNpcActive": {
        const npc = requireNpc(world, action.npc);
        if (!npc.movement) throw new ActionFailure("invalid-target", `npc "${npc.id}" has no movement`);
        npc.movement.active = action.active;
        return;
      }
      case "spinnerMessage": {
        const wedges = world.spinners[action.spinner];
        if (!wedges) throw new ActionFailure("missing-entity", `spinner "${action.spinner}" does not exist`);
        const wedge = pickWeighted(wedges, nextRoll(world, `spinner:${action.spinner}`));
        if (wedge && wedge.text.length > 0) view.push(tag, wedge.text);
        return;
      }
      case "damage":
      case "heal":
        this.applyHealth(action, world, view);
        return;
      case "removeEffect": {
        const health = healthOf(world, action.npc);
        const before = health.effects.length;
        health.effects = health.effects.filter((effect) => effect.cause !== action.cause);
        if (health.effects.length === before) {
          throw new ActionFailure("invalid-target", `no effect "${action.cause}" to remove`);
        }
        return;
      }
      case "setTriggerEnabled":
        if (!this.deps.triggers?.setEnabled(action.trigger, action.enabled)) {
          throw new ActionFailure("missing-entity", `trigger "${action.trigger}" does not exist`);
        }
        return;
      case "scheduleIn": {
        let turns = Math.floor(action.turns);
        if (turns < 0) {
          reportDiagnostic(world, "schedule-clamped", originLabel(origin), `scheduleIn ${action.turns} clamped to 0`);
          turns = 0;
        }
        this.scheduleFrom(action, world, origin, world.turnCount + turns, null);
        return;
      }
      case "scheduleAt":
        this.scheduleFrom(action, world, origin, action.turn, null);
        return;
      case "scheduleEvery": {
        const every = Math.max(1, Math.floor(action.every));
        const times = action.times === undefined ? null : Math.max(1, Math.floor(action.times));
        this.scheduleFrom(action, world, origin, world.turnCount + every, {
          every,
          remaining: times === null ? null : times - 1
        });
        return;
      }
    }
  }

  private applyHealth(action: Extract<Action, { kind: "damage" | "heal" }>, world: WorldState, view: OutputView): void {
    const health = healthOf(world, action.npc);
    const who = action.npc === undefined ? world.player.name : requireNpc(world, action.npc).name;
    const amount = Math.max(0, action.amount);
    if (action.turns !== undefined && action.turns > 1) {
      health.effects.push({
        kind: action.kind === "damage" ? "damageOverTime" : "healOverTime",
        cause: action.cause,
        amount,
        remaining: Math.floor(action.turns)
      });
      return;
    }
    const change = applyHealthChange(health, action.kind === "damage" ? -amount : amount);
    view.push("health", formatHealthChange(who, change, action.cause));
  }

  private scheduleFrom(
    action: ScheduleOptions,
    world: WorldState,
    origin: EventOrigin,
    dueTurn: number,
    recurrence: { every: number; remaining: number | null } | null
  ): void {
    this.deps.scheduler.schedule(world, {
      dueTurn,
      condition: action.condition ?? null,
      actions: action.actions,
      onFalse: action.onFalse ?? DEFAULT_POLICY,
      origin: { triggerId: origin.triggerId, parentEventId: origin.parentEventId },
      note: action.note ?? null,
      recurrence
    });
  }
}

function formatPoints(amount: number): string {
  return amount >= 0 ? `+${amount} points` : `${amount} points`;
}

function originLabel(origin: EventOrigin): string {
  if (origin.parentEventId !== null) return `event #${origin.parentEventId}`;
  if (origin.triggerId !== null) return `trigger ${origin.triggerId}`;
  return "ActionExecutor";
}
