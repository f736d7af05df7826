import type { OnFalsePolicy, OutputItem, ScheduledEvent } from "../types/engine";
import type { GameEngine } from "./GameEngine";

export type DebugCommand =
  | { kind: "listSchedule" }
  | { kind: "cancelEvent"; id: number }
  | { kind: "delayEvent"; id: number; turns: number }
  | { kind: "listTriggers" }
  | { kind: "listGoals" }
  | { kind: "invalid"; message: string };

const USAGE = "Usage: :sched | :sched cancel <id> | :sched delay <id> <turns> | :triggers | :goals";

function parseCount(token: string | undefined): number | null {
  if (token === undefined || !/^-?\d+$/.test(token)) return null;
  return Number.parseInt(token, 10);
}

export function parseDebugCommand(input: string): DebugCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith(":")) return null;
  const [head, sub, first, second, ...rest] = trimmed.split(/\s+/);

  if (head === ":triggers" && sub === undefined) return { kind: "listTriggers" };
  if (head === ":goals" && sub === undefined) return { kind: "listGoals" };
  if (head !== ":sched") return { kind: "invalid", message: USAGE };
  if (sub === undefined) return { kind: "listSchedule" };

  const id = parseCount(first);
  if (sub === "cancel" && id !== null && second === undefined) return { kind: "cancelEvent", id };
  const turns = parseCount(second);
  if (sub === "delay" && id !== null && turns !== null && rest.length === 0) return { kind: "delayEvent", id, turns };
  return { kind: "invalid", message: USAGE };
}

function describePolicy(policy: OnFalsePolicy): string {
  switch (policy.kind) {
    case "cancel":
      return "cancel";
    case "retryAfter":
      return `retry after ${policy.turns}`;
    case "retryNextTurn":
      return "retry next turn";
  }
}

function describeEvent(event: ScheduledEvent, turn: number): string {
  const parts = [
    `#${event.id}`,
    `due turn ${event.dueTurn} (in ${event.dueTurn - turn})`,
    event.condition ? "conditional" : "unconditional",
    `on false: ${describePolicy(event.onFalse)}`,
    `${event.actions.length} action(s)`
  ];
  if (event.note) parts.push(`note: "${event.note}"`);
  return parts.join(" | ");
}

function line(text: string): OutputItem {
  return { tag: "engine", text };
}

export function runDebugCommand(engine: GameEngine, command: DebugCommand): OutputItem[] {
  const world = engine.getWorld();
  switch (command.kind) {
    case "listSchedule": {
      const pending = engine.scheduler.listPending();
      if (pending.length === 0) return [line("No scheduled events.")];
      return [line(`Scheduled events at turn ${world.turnCount}:`), ...pending.map((event) => line(describeEvent(event, world.turnCount)))];
    }
    case "cancelEvent":
      return engine.scheduler.cancel(world, command.id)
        ? [line(`Cancelled event #${command.id}.`)]
        : [{ tag: "error", text: `No pending event #${command.id}.` }];
    case "delayEvent": {
      const next = engine.scheduler.delay(world, command.id, command.turns);
      return next === null
        ? [{ tag: "error", text: `No pending event #${command.id}.` }]
        : [line(`Event #${command.id} delayed as #${next}.`)];
    }
    case "listTriggers":
      return engine.triggers.list().map(({ definition, state }) => line(
        `${definition.id} [${definition.event.kind}] ${state.enabled ? "enabled" : "disabled"}`
          + `${definition.fireOnce ? ", once" : ""}, fired ${state.fireCount}x`
      ));
    case "listGoals":
      return engine.goals.summarize(world).map((goal) => line(`${goal.id} (${goal.group}): ${goal.status}`));
    case "invalid":
      return [{ tag: "error", text: command.message }];
  }
}
