import type {
  Condition,
  EventMatcher,
  Flag,
  GameEvent,
  Goal,
  GoalId,
  GoalStatus,
  LeafCondition,
  WorldState
} from "../../types/engine";
import { nextRoll } from "../engine/seededRoll";
import { reportDiagnostic } from "../logging/diagnostics";

export interface EvaluationContext {
  event?: GameEvent | null;
  source?: string;
}

interface EvaluationScope {
  event: GameEvent | null;
  source: string;
  goalStack: Set<GoalId>;
}

export function matchesEvent(matcher: EventMatcher, event: GameEvent): boolean {
  if (matcher.kind !== event.kind) return false;
  const expected = matcher.params ?? {};
  const actual = event.params ?? {};
  return Object.entries(expected).every(([key, value]) => actual[key] === value);
}

export function isFlagComplete(flag: Flag): boolean {
  if (!flag.sequence) return true;
  return flag.sequence.end !== null && flag.sequence.step >= flag.sequence.end;
}

export function goalStatus(goal: Goal, holds: (condition: Condition) => boolean): GoalStatus {
  if (goal.failedWhen && holds(goal.failedWhen)) return "failed";
  if (goal.activateWhen && !holds(goal.activateWhen)) return "inactive";
  return holds(goal.finishedWhen) ? "complete" : "active";
}

export function evaluateCondition(condition: Condition, world: WorldState, context: EvaluationContext = {}): boolean {
  return evaluate(condition, world, {
    event: context.event ?? null,
    source: context.source ?? "condition",
    goalStack: new Set()
  });
}

function evaluate(condition: Condition, world: WorldState, scope: EvaluationScope): boolean {
  switch (condition.kind) {
    case "all":
      for (const child of condition.children) {
        if (!evaluate(child, world, scope)) return false;
      }
      return true;
    case "any":
      for (const child of condition.children) {
        if (evaluate(child, world, scope)) return true;
      }
      return false;
    default:
      return evaluateLeaf(condition, world, scope);
  }
}

function missing(world: WorldState, scope: EvaluationScope, what: string, id: string): false {
  reportDiagnostic(world, "missing-entity", scope.source, `${what} "${id}" does not exist`);
  return false;
}

function evaluateLeaf(condition: LeafCondition, world: WorldState, scope: EvaluationScope): boolean {
  const { player } = world;
  switch (condition.kind) {
    case "hasFlag":
      return condition.flag in player.flags;
    case "missingFlag":
      return !(condition.flag in player.flags);
    case "flagInProgress": {
      const flag = player.flags[condition.flag];
      return flag !== undefined && !isFlagComplete(flag);
    }
    case "flagComplete": {
      const flag = player.flags[condition.flag];
      return flag !== undefined && isFlagComplete(flag);
    }
    case "hasItem": {
      const item = world.items[condition.item];
      if (!item) return missing(world, scope, "item", condition.item);
      return item.location.kind === "inventory";
    }
    case "missingItem": {
      const item = world.items[condition.item];
      if (!item) return missing(world, scope, "item", condition.item);
      return item.location.kind !== "inventory";
    }
    case "hasVisited":
    case "reachedRoom": {
      const room = world.rooms[condition.room];
      if (!room) return missing(world, scope, "room", condition.room);
      return room.visited;
    }
    case "playerInRoom":
      if (!world.rooms[condition.room]) return missing(world, scope, "room", condition.room);
      return player.location === condition.room;
    case "withNpc": {
      const npc = world.npcs[condition.npc];
      if (!npc) return missing(world, scope, "npc", condition.npc);
      return npc.location !== null && npc.location === player.location;
    }
    case "npcHasItem": {
      if (!world.npcs[condition.npc]) return missing(world, scope, "npc", condition.npc);
      const item = world.items[condition.item];
      if (!item) return missing(world, scope, "item", condition.item);
      return item.location.kind === "npc" && item.location.npc === condition.npc;
    }
    case "npcInState": {
      const npc = world.npcs[condition.npc];
      if (!npc) return missing(world, scope, "npc", condition.npc);
      return npc.state === condition.state;
    }
    case "containerHasItem": {
      if (!world.items[condition.container]) return missing(world, scope, "container", condition.container);
      const item = world.items[condition.item];
      if (!item) return missing(world, scope, "item", condition.item);
      return item.location.kind === "container" && item.location.container === condition.container;
    }
    case "goalComplete": {
      const goal = world.goals[condition.goal];
      if (!goal) return missing(world, scope, "goal", condition.goal);
      if (scope.goalStack.has(goal.id)) {
        reportDiagnostic(world, "invalid-target", scope.source, `goal "${goal.id}" refers to itself`);
        return false;
      }
      scope.goalStack.add(goal.id);
      const status = goalStatus(goal, (child) => evaluate(child, world, scope));
      scope.goalStack.delete(goal.id);
      return status === "complete";
    }
    case "eventMatches":
      return scope.event !== null && matchesEvent(condition.event, scope.event);
    case "chancePercent":
      return nextRoll(world, "chance") * 100 < condition.percent;
    case "turnAtLeast":
      return world.turnCount >= condition.turn;
  }
}
