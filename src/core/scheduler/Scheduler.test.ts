import { describe, expect, it } from "vitest";
import { createTestRig, texts } from "../../testing/testRig";
import type { Action } from "../../types/engine";
import type { ScheduleRequest } from "../actions/contracts";
import { QueueCorruptionError } from "../errors";

function request(dueTurn: number, overrides: Partial<ScheduleRequest> = {}): ScheduleRequest {
  return {
    dueTurn,
    condition: null,
    actions: [],
    onFalse: { kind: "cancel" },
    origin: { triggerId: null, parentEventId: null },
    note: null,
    recurrence: null,
    ...overrides
  };
}

function say(text: string): Action[] {
  return [{ kind: "showMessage", text }];
}

describe("Scheduler", () => {
  it("drains due events by turn, then by insertion order", () => {
    const { world, view, scheduler } = createTestRig();
    scheduler.schedule(world, request(2, { actions: say("first") }));
    scheduler.schedule(world, request(2, { actions: say("second") }));
    scheduler.schedule(world, request(2, { actions: say("third") }));
    scheduler.schedule(world, request(1, { actions: say("zero") }));
    scheduler.schedule(world, request(3, { actions: say("not yet") }));
    world.turnCount = 2;

    const report = scheduler.drainDue(2, world, view);

    expect(texts(view)).toEqual(["zero", "first", "second", "third"]);
    expect(report.resolutions.map((entry) => entry.eventId)).toEqual([4, 1, 2, 3]);
    expect(scheduler.listPending().map((event) => event.id)).toEqual([5]);
    expect(view.pending()[0]?.tag).toBe("ambient");
  });

  it("resolves each due event exactly once per drain", () => {
    const { world, view, scheduler } = createTestRig();
    scheduler.schedule(world, request(1, { actions: say("go") }));
    scheduler.schedule(world, request(1, { condition: { kind: "hasFlag", flag: "never" } }));
    scheduler.schedule(world, request(1, {
      condition: { kind: "hasFlag", flag: "never" },
      onFalse: { kind: "retryNextTurn" }
    }));
    world.turnCount = 1;

    const report = scheduler.drainDue(1, world, view);

    expect(report.resolutions).toEqual([
      { eventId: 1, status: "fired", nextEventId: null },
      { eventId: 2, status: "cancelled", nextEventId: null },
      { eventId: 3, status: "rescheduled", nextEventId: 4 }
    ]);
    expect(scheduler.listPending().map((event) => [event.id, event.dueTurn])).toEqual([[4, 2]]);
  });

  it("holds events inserted during a drain until the next drain", () => {
    const { world, view, scheduler } = createTestRig();
    world.turnCount = 1;
    scheduler.schedule(world, request(1, {
      actions: [{ kind: "scheduleIn", turns: 0, actions: say("later") }]
    }));

    scheduler.drainDue(1, world, view);
    expect(texts(view)).toEqual([]);
    const [queued] = scheduler.listPending();
    expect(queued?.id).toBe(2);
    expect(queued?.origin).toEqual({ triggerId: null, parentEventId: 1 });

    scheduler.drainDue(1, world, view);
    expect(texts(view)).toEqual(["later"]);
  });

  it("never revisits a cancelled event", () => {
    const { world, view, scheduler } = createTestRig();
    scheduler.schedule(world, request(1, { condition: { kind: "hasFlag", flag: "open" }, actions: say("opened") }));
    world.turnCount = 1;
    scheduler.drainDue(1, world, view);
    expect(scheduler.getTombstone(1)?.status).toBe("cancelled");

    world.player.flags.open = { name: "open", turnSet: 1, sequence: null };
    world.turnCount = 2;
    scheduler.drainDue(2, world, view);
    expect(texts(view)).toEqual([]);
    expect(scheduler.listPending()).toEqual([]);
  });

  it("treats retryAfter 0 the same as retryAfter 1", () => {
    const zero = createTestRig();
    const one = createTestRig();
    const condition = { kind: "hasFlag", flag: "ready" } as const;
    zero.scheduler.schedule(zero.world, request(1, { condition, onFalse: { kind: "retryAfter", turns: 0 } }));
    one.scheduler.schedule(one.world, request(1, { condition, onFalse: { kind: "retryAfter", turns: 1 } }));
    expect(zero.world.diagnostics.map((entry) => entry.code)).toEqual(["policy-clamped"]);

    zero.world.turnCount = 1;
    one.world.turnCount = 1;
    zero.scheduler.drainDue(1, zero.world, zero.view);
    one.scheduler.drainDue(1, one.world, one.view);

    expect(zero.scheduler.listPending()).toEqual(one.scheduler.listPending());
    expect(zero.scheduler.listPending()[0]?.dueTurn).toBe(2);
    expect(zero.scheduler.getTombstone(1)).toEqual(one.scheduler.getTombstone(1));
  });

  it("keeps the originating trigger on rescheduled events", () => {
    const { world, view, scheduler } = createTestRig();
    scheduler.schedule(world, request(1, {
      condition: { kind: "hasFlag", flag: "ready" },
      onFalse: { kind: "retryAfter", turns: 3 },
      origin: { triggerId: "bell", parentEventId: null },
      note: "bell rings"
    }));
    world.turnCount = 1;
    scheduler.drainDue(1, world, view);

    expect(scheduler.getTombstone(1)).toEqual({
      eventId: 1,
      status: "rescheduled",
      dueTurn: 1,
      resolvedTurn: 1,
      nextEventId: 2,
      note: "bell rings",
      originTriggerId: "bell"
    });
    const [retry] = scheduler.listPending();
    expect(retry?.dueTurn).toBe(4);
    expect(retry?.origin).toEqual({ triggerId: "bell", parentEventId: 1 });
  });

  it("repeats recurring events the requested number of times", () => {
    const { world, view, scheduler, executor } = createTestRig();
    executor.execute([{ kind: "scheduleEvery", every: 2, times: 2, actions: say("tick") }], world, view);
    expect(scheduler.listPending()[0]?.recurrence).toEqual({ every: 2, remaining: 1 });

    for (let turn = 1; turn <= 6; turn += 1) {
      world.turnCount = turn;
      scheduler.drainDue(turn, world, view);
    }

    expect(texts(view)).toEqual(["tick", "tick"]);
    expect(scheduler.getTombstone(1)?.nextEventId).toBe(2);
    expect(scheduler.getTombstone(2)?.nextEventId).toBeNull();
    expect(scheduler.listPending()).toEqual([]);
  });

  it("cancels pending events permanently and refuses a second cancel", () => {
    const { world, view, scheduler } = createTestRig();
    scheduler.schedule(world, request(2, { actions: say("boom") }));

    expect(scheduler.cancel(world, 1)).toBe(true);
    expect(scheduler.statusOf(1)).toBe("cancelled");
    expect(scheduler.cancel(world, 1)).toBe(false);
    expect(world.diagnostics.at(-1)).toEqual({
      code: "illegal-transition",
      source: "Scheduler #1",
      message: "Invalid transition cancelled -> cancelled",
      turn: 0
    });

    world.turnCount = 2;
    scheduler.drainDue(2, world, view);
    expect(texts(view)).toEqual([]);
  });

  it("delays events under a new id", () => {
    const { world, scheduler } = createTestRig();
    scheduler.schedule(world, request(3));

    expect(scheduler.delay(world, 1, 2)).toBe(2);
    expect(scheduler.getTombstone(1)?.status).toBe("rescheduled");
    expect(scheduler.getTombstone(1)?.nextEventId).toBe(2);
    expect(scheduler.getPending(2)?.dueTurn).toBe(5);

    expect(scheduler.delay(world, 2, 0)).toBe(3);
    expect(scheduler.getPending(3)?.dueTurn).toBe(6);
    expect(world.diagnostics.at(-1)?.code).toBe("policy-clamped");

    expect(scheduler.delay(world, 9, 1)).toBeNull();
    expect(world.diagnostics.at(-1)?.message).toBe("event #9 is unknown");
    expect(scheduler.delay(world, 1, 1)).toBeNull();
    expect(world.diagnostics.at(-1)).toEqual({
      code: "invalid-target",
      source: "Scheduler",
      message: "event #1 is already rescheduled",
      turn: 0
    });
  });

  it("clamps due turns in the past to the current turn", () => {
    const { world, scheduler } = createTestRig();
    world.turnCount = 5;
    scheduler.schedule(world, request(2));
    expect(scheduler.getPending(1)?.dueTurn).toBe(5);
    expect(world.diagnostics.at(-1)?.code).toBe("schedule-clamped");
  });

  it("compacts the oldest tombstones without reusing ids", () => {
    const { world, view, scheduler } = createTestRig({}, { tombstoneRetention: 2 });
    for (let i = 0; i < 4; i += 1) scheduler.schedule(world, request(1));
    world.turnCount = 1;
    scheduler.drainDue(1, world, view);

    expect(scheduler.listTombstones().map((tombstone) => tombstone.eventId)).toEqual([3, 4]);
    expect(scheduler.schedule(world, request(2))).toBe(5);
    expect(scheduler.compact(0)).toBe(2);
  });

  it("restores a captured queue and continues its id counter", () => {
    const source = createTestRig();
    source.scheduler.schedule(source.world, request(2, { note: "keep" }));
    source.scheduler.schedule(source.world, request(1));
    source.world.turnCount = 1;
    source.scheduler.drainDue(1, source.world, source.view);
    const snapshot = source.scheduler.captureState();

    const target = createTestRig();
    target.scheduler.restoreState(snapshot, 1);

    expect(target.scheduler.listPending()).toEqual(source.scheduler.listPending());
    expect(target.scheduler.getTombstone(2)?.status).toBe("fired");
    expect(target.scheduler.schedule(target.world, request(3))).toBe(3);
  });

  it("rejects corrupted queues", () => {
    const { world, scheduler } = createTestRig();
    scheduler.schedule(world, request(4));
    const snapshot = scheduler.captureState();
    const pending = snapshot.pending[0];
    if (!pending) throw new Error("expected a pending event");

    const { scheduler: fresh } = createTestRig();
    expect(() => fresh.restoreState({ ...snapshot, pending: [pending, pending] }, 0)).toThrow(QueueCorruptionError);
    expect(() => fresh.restoreState(snapshot, 5)).toThrow(QueueCorruptionError);
    expect(() => fresh.restoreState({ ...snapshot, nextId: 1 }, 0)).toThrow(QueueCorruptionError);
    expect(fresh.listPending()).toEqual([]);
  });
});
