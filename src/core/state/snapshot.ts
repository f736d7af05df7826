import type { SchedulerSnapshot, TriggerId, TriggerRuntimeState, WorldState } from "../../types/engine";
import { SnapshotValidationError } from "../errors";
import type { Scheduler } from "../scheduler/Scheduler";
import type { TriggerRegistry } from "../triggers/TriggerRegistry";
import { normalizeSnapshot } from "../validation/snapshotValidation";

export interface EngineSnapshot {
  version: 1;
  savedAt: string | null;
  world: WorldState;
  triggers: Record<TriggerId, TriggerRuntimeState>;
  scheduler: SchedulerSnapshot;
}

export function captureSnapshot(world: WorldState, triggers: TriggerRegistry, scheduler: Scheduler): EngineSnapshot {
  return {
    version: 1,
    savedAt: null,
    world: structuredClone(world),
    triggers: triggers.captureState(),
    scheduler: scheduler.captureState()
  };
}

// Validates everything before touching the registry or scheduler, so a rejected snapshot leaves both as they were.
export function restoreSnapshot(candidate: unknown, triggers: TriggerRegistry, scheduler: Scheduler): WorldState {
  const snapshot = normalizeSnapshot(candidate);
  if (!snapshot) throw new SnapshotValidationError("Snapshot does not have the expected shape");
  triggers.assertKnown(Object.keys(snapshot.triggers));
  scheduler.restoreState(snapshot.scheduler, snapshot.world.clock.lastProcessedTurn);
  triggers.restoreState(snapshot.triggers);
  return snapshot.world;
}
