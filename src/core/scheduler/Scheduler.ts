import { ENGINE_DEFAULTS } from "../../config";
import type {
  EventId,
  EventStatus,
  OnFalsePolicy,
  ScheduledEvent,
  SchedulerSnapshot,
  TerminalStatus,
  Tombstone,
  WorldState
} from "../../types/engine";
import type { ActionRunner, ScheduleRequest, ScheduleSink } from "../actions/contracts";
import { evaluateCondition } from "../conditions/ConditionEvaluator";
import { EVENT_LIFECYCLE, StateMachine } from "../engine/StateMachine";
import { safeTransition } from "../engine/safeTransition";
import { QueueCorruptionError } from "../errors";
import { reportDiagnostic } from "../logging/diagnostics";
import { createLogger } from "../logging/logger";
import { pendingEventIssues } from "../validation/snapshotValidation";
import type { OutputView } from "../view/OutputView";

export interface SchedulerOptions {
  tombstoneRetention?: number;
}

export interface EventResolution {
  eventId: EventId;
  status: TerminalStatus;
  nextEventId: EventId | null;
}

export interface DrainReport {
  turn: number;
  resolutions: EventResolution[];
}

const logger = createLogger("Scheduler");

function byDueThenId(a: ScheduledEvent, b: ScheduledEvent): number {
  return a.dueTurn - b.dueTurn || a.id - b.id;
}

function retryDelay(policy: OnFalsePolicy): number {
  if (policy.kind === "retryAfter") return Math.max(1, policy.turns);
  return 1;
}

function label(event: ScheduledEvent): string {
  return event.note ? `#${event.id} "${event.note}"` : `#${event.id}`;
}

export class Scheduler implements ScheduleSink {
  private nextId: EventId = 1;
  private readonly pending = new Map<EventId, ScheduledEvent>();
  private readonly tombstones = new Map<EventId, Tombstone>();
  private readonly tombstoneRetention: number;

  constructor(private readonly runner: ActionRunner, options: SchedulerOptions = {}) {
    this.tombstoneRetention = options.tombstoneRetention ?? ENGINE_DEFAULTS.tombstoneRetention;
  }

  schedule(world: WorldState, request: ScheduleRequest): EventId {
    let dueTurn = Math.floor(request.dueTurn);
    if (dueTurn < world.turnCount) {
      reportDiagnostic(world, "schedule-clamped", "Scheduler", `due turn ${dueTurn} is in the past; using turn ${world.turnCount}`);
      dueTurn = world.turnCount;
    }
    const event: ScheduledEvent = {
      id: this.nextId,
      dueTurn,
      scheduledTurn: world.turnCount,
      condition: request.condition,
      actions: request.actions,
      onFalse: this.normalizePolicy(world, request.onFalse),
      origin: request.origin,
      note: request.note,
      recurrence: request.recurrence
        ? { every: Math.max(1, Math.floor(request.recurrence.every)), remaining: request.recurrence.remaining }
        : null
    };
    this.nextId += 1;
    this.pending.set(event.id, event);
    logger.info(`scheduled ${label(event)} for turn ${dueTurn}`);
    return event.id;
  }

  drainDue(currentTurn: number, world: WorldState, view: OutputView): DrainReport {
    const due = [...this.pending.values()].filter((event) => event.dueTurn <= currentTurn).sort(byDueThenId);
    const resolutions: EventResolution[] = [];

    for (const event of due) {
      if (!this.pending.has(event.id)) continue;
      const ready = event.condition === null
        || evaluateCondition(event.condition, world, { source: `event ${label(event)}` });

      if (ready) {
        const nextEventId = this.scheduleRecurrence(world, event, currentTurn);
        if (!this.resolve(world, event.id, "fired", currentTurn, nextEventId)) continue;
        logger.info(`fired ${label(event)} on turn ${currentTurn}`);
        resolutions.push({ eventId: event.id, status: "fired", nextEventId });
        this.runner.runActions(event.actions, world, view, {
          triggerId: event.origin.triggerId,
          parentEventId: event.id
        });
        continue;
      }

      if (event.onFalse.kind === "cancel") {
        if (!this.resolve(world, event.id, "cancelled", currentTurn, null)) continue;
        logger.info(`cancelled ${label(event)}: condition false`);
        resolutions.push({ eventId: event.id, status: "cancelled", nextEventId: null });
        continue;
      }

      const nextEventId = this.reinsert(world, event, currentTurn + retryDelay(event.onFalse));
      if (!this.resolve(world, event.id, "rescheduled", currentTurn, nextEventId)) continue;
      logger.info(`rescheduled ${label(event)} as #${nextEventId}`);
      resolutions.push({ eventId: event.id, status: "rescheduled", nextEventId });
    }

    this.compact();
    return { turn: currentTurn, resolutions };
  }

  listPending(): ScheduledEvent[] {
    return [...this.pending.values()].sort(byDueThenId).map((event) => structuredClone(event));
  }

  getPending(id: EventId): ScheduledEvent | null {
    const event = this.pending.get(id);
    return event ? structuredClone(event) : null;
  }

  getTombstone(id: EventId): Tombstone | null {
    return this.tombstones.get(id) ?? null;
  }

  listTombstones(): Tombstone[] {
    return [...this.tombstones.values()].sort((a, b) => a.eventId - b.eventId);
  }

  statusOf(id: EventId): EventStatus | null {
    if (this.pending.has(id)) return "pending";
    return this.tombstones.get(id)?.status ?? null;
  }

  cancel(world: WorldState, id: EventId): boolean {
    if (!this.resolve(world, id, "cancelled", world.turnCount, null)) return false;
    logger.info(`cancelled #${id} by request`);
    return true;
  }

  delay(world: WorldState, id: EventId, turns: number): EventId | null {
    const event = this.pending.get(id);
    if (!event) {
      const status = this.statusOf(id);
      reportDiagnostic(
        world,
        "invalid-target",
        "Scheduler",
        status === null ? `event #${id} is unknown` : `event #${id} is already ${status}`
      );
      return null;
    }
    let by = Math.floor(turns);
    if (!(by >= 1)) {
      reportDiagnostic(world, "policy-clamped", "Scheduler", `delay of ${turns} turns for #${id} clamped to 1`);
      by = 1;
    }
    const nextEventId = this.reinsert(world, event, event.dueTurn + by);
    this.resolve(world, id, "rescheduled", world.turnCount, nextEventId);
    logger.info(`delayed #${id} by ${by} as #${nextEventId}`);
    return nextEventId;
  }

  compact(retention = this.tombstoneRetention): number {
    const excess = this.tombstones.size - Math.max(0, retention);
    if (excess <= 0) return 0;
    const oldest = [...this.tombstones.keys()].sort((a, b) => a - b).slice(0, excess);
    oldest.forEach((id) => this.tombstones.delete(id));
    logger.debug(`compacted ${oldest.length} tombstones`);
    return oldest.length;
  }

  captureState(): SchedulerSnapshot {
    return {
      nextId: this.nextId,
      pending: this.listPending(),
      tombstones: this.listTombstones().map((tombstone) => ({ ...tombstone }))
    };
  }

  restoreState(snapshot: SchedulerSnapshot, lastProcessedTurn: number): void {
    const seen = new Set<EventId>();
    const claim = (id: EventId): void => {
      if (!Number.isInteger(id) || id < 1) throw new QueueCorruptionError(`event id ${id} is not a positive integer`);
      if (id >= snapshot.nextId) throw new QueueCorruptionError(`event id ${id} is not below the id counter ${snapshot.nextId}`);
      if (seen.has(id)) throw new QueueCorruptionError(`event id ${id} appears more than once`);
      seen.add(id);
    };
    snapshot.pending.forEach((event) => {
      claim(event.id);
      if (event.dueTurn < lastProcessedTurn) {
        throw new QueueCorruptionError(`pending event #${event.id} is due on turn ${event.dueTurn}, before processed turn ${lastProcessedTurn}`);
      }
      const issues = pendingEventIssues(event);
      if (issues.length > 0) {
        throw new QueueCorruptionError(`pending event #${event.id} is malformed: ${issues.join("; ")}`);
      }
    });
    snapshot.tombstones.forEach((tombstone) => claim(tombstone.eventId));

    this.pending.clear();
    this.tombstones.clear();
    [...snapshot.pending].sort(byDueThenId).forEach((event) => this.pending.set(event.id, structuredClone(event)));
    [...snapshot.tombstones]
      .sort((a, b) => a.eventId - b.eventId)
      .forEach((tombstone) => this.tombstones.set(tombstone.eventId, { ...tombstone }));
    this.nextId = snapshot.nextId;
  }

  private normalizePolicy(world: WorldState, policy: OnFalsePolicy): OnFalsePolicy {
    if (policy.kind !== "retryAfter") return policy;
    const turns = Math.floor(policy.turns);
    if (turns >= 1) return { kind: "retryAfter", turns };
    reportDiagnostic(world, "policy-clamped", "Scheduler", `retryAfter ${policy.turns} clamped to 1`);
    return { kind: "retryAfter", turns: 1 };
  }

  private reinsert(world: WorldState, event: ScheduledEvent, dueTurn: number): EventId {
    return this.schedule(world, {
      dueTurn,
      condition: event.condition,
      actions: event.actions,
      onFalse: event.onFalse,
      origin: { triggerId: event.origin.triggerId, parentEventId: event.id },
      note: event.note,
      recurrence: event.recurrence
    });
  }

  private scheduleRecurrence(world: WorldState, event: ScheduledEvent, currentTurn: number): EventId | null {
    const { recurrence } = event;
    if (!recurrence || recurrence.remaining === 0) return null;
    return this.schedule(world, {
      dueTurn: currentTurn + recurrence.every,
      condition: event.condition,
      actions: event.actions,
      onFalse: event.onFalse,
      origin: { triggerId: event.origin.triggerId, parentEventId: event.id },
      note: event.note,
      recurrence: {
        every: recurrence.every,
        remaining: recurrence.remaining === null ? null : recurrence.remaining - 1
      }
    });
  }

  private resolve(world: WorldState, id: EventId, status: TerminalStatus, turn: number, nextEventId: EventId | null): boolean {
    const current = this.statusOf(id);
    if (current === null) {
      reportDiagnostic(world, "invalid-target", "Scheduler", `event #${id} is unknown`);
      return false;
    }
    const machine = new StateMachine(EVENT_LIFECYCLE, current);
    if (!safeTransition(machine, world, status, `Scheduler #${id}`)) return false;
    const event = this.pending.get(id);
    if (!event) return false;
    this.pending.delete(id);
    this.tombstones.set(id, {
      eventId: id,
      status,
      dueTurn: event.dueTurn,
      resolvedTurn: turn,
      nextEventId,
      note: event.note,
      originTriggerId: event.origin.triggerId
    });
    return true;
  }
}
