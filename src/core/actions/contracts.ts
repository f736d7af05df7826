import type { Action, Condition, EventId, EventOrigin, OnFalsePolicy, Recurrence, TriggerId, WorldState } from "../../types/engine";
import type { OutputView } from "../view/OutputView";

export interface ActionRunner {
  runActions(actions: Action[], world: WorldState, view: OutputView, origin: EventOrigin): void;
}

export interface ScheduleRequest {
  dueTurn: number;
  condition: Condition | null;
  actions: Action[];
  onFalse: OnFalsePolicy;
  origin: EventOrigin;
  note: string | null;
  recurrence: Recurrence | null;
}

export interface ScheduleSink {
  schedule(world: WorldState, request: ScheduleRequest): EventId;
}

export interface TriggerSwitch {
  setEnabled(id: TriggerId, enabled: boolean): boolean;
}

export const NO_ORIGIN: EventOrigin = { triggerId: null, parentEventId: null };
