import { describe, expect, it } from "vitest";
import { GameEngine } from "../../app/GameEngine";
import { testBundle } from "../../testing/testBundle";
import type { OutputItem } from "../../types/engine";
import { QueueCorruptionError, SnapshotValidationError } from "../errors";
import { createMemoryStorage, SaveStateManager } from "./SaveStateManager";

function createEngine(): GameEngine {
  return new GameEngine(testBundle({
    triggers: [
      {
        id: "coin-toss",
        name: "Coin toss",
        event: { kind: "always" },
        condition: { kind: "chancePercent", percent: 50 },
        actions: [{ kind: "awardPoints", amount: 1 }]
      },
      {
        id: "gusts",
        name: "Gusts",
        event: { kind: "always" },
        condition: { kind: "turnAtLeast", turn: 1 },
        actions: [{ kind: "scheduleEvery", every: 2, actions: [{ kind: "spinnerMessage", spinner: "wind" }] }],
        fireOnce: true
      }
    ]
  }), { config: { logLevel: "silent" } });
}

function play(engine: GameEngine, turns: number): OutputItem[][] {
  const outputs: OutputItem[][] = [];
  for (let i = 0; i < turns; i += 1) {
    engine.advanceClock();
    outputs.push(engine.advanceTurn().output);
  }
  return outputs;
}

describe("snapshots", () => {
  it("resume with identical behavior after a save round trip", () => {
    const original = createEngine();
    play(original, 3);
    const manager = new SaveStateManager(createMemoryStorage());
    manager.save(original.snapshot());

    const resumed = createEngine();
    resumed.restore(manager.load());

    expect(play(resumed, 5)).toEqual(play(original, 5));
    expect(resumed.getWorld()).toEqual(original.getWorld());
    expect(resumed.scheduler.captureState()).toEqual(original.scheduler.captureState());
    expect(resumed.triggers.captureState()).toEqual(original.triggers.captureState());
  });

  it("refuses a queue with an overdue pending event and keeps the current state", () => {
    const engine = createEngine();
    play(engine, 2);
    const snapshot = engine.snapshot();
    const pending = snapshot.scheduler.pending[0];
    if (!pending) throw new Error("expected a pending event");
    const tampered = {
      ...snapshot,
      scheduler: { ...snapshot.scheduler, pending: [{ ...pending, dueTurn: 0 }] }
    };

    expect(() => engine.restore(tampered)).toThrow(QueueCorruptionError);
    expect(engine.scheduler.listPending()).toEqual(snapshot.scheduler.pending);
  });

  it("refuses a pending event whose condition or policy is malformed", () => {
    const engine = createEngine();
    play(engine, 2);
    const snapshot = engine.snapshot();
    const pending = snapshot.scheduler.pending[0];
    if (!pending) throw new Error("expected a pending event");
    const withPending = (event: unknown) => ({
      ...snapshot,
      scheduler: { ...snapshot.scheduler, pending: [event] }
    });

    expect(() => engine.restore(withPending({ ...pending, condition: { kind: "all" } }))).toThrow(QueueCorruptionError);
    expect(() => engine.restore(withPending({ ...pending, onFalse: { kind: "retryAfter" } }))).toThrow(QueueCorruptionError);
    expect(() => engine.restore(withPending({ ...pending, actions: [{ kind: "teleport" }] }))).toThrow(QueueCorruptionError);
    expect(engine.scheduler.listPending()).toEqual(snapshot.scheduler.pending);
    expect(() => engine.advanceTurn()).not.toThrow();
  });

  it("refuses snapshots of the wrong shape or with unknown triggers", () => {
    const engine = createEngine();
    expect(() => engine.restore({ version: 1 })).toThrow(SnapshotValidationError);
    const snapshot = engine.snapshot();
    const stray = snapshot.triggers["coin-toss"];
    expect(() => engine.restore({ ...snapshot, triggers: { ...snapshot.triggers, stray } })).toThrow(SnapshotValidationError);
  });
});
