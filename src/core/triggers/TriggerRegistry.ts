import type { EventKind, GameEvent, TriggerDefinition, TriggerId, TriggerRuntimeState, WorldState } from "../../types/engine";
import type { ActionRunner, TriggerSwitch } from "../actions/contracts";
import { evaluateCondition, matchesEvent } from "../conditions/ConditionEvaluator";
import { BundleValidationError, SnapshotValidationError } from "../errors";
import { createLogger } from "../logging/logger";
import type { OutputView } from "../view/OutputView";

export interface RegisteredTrigger {
  definition: TriggerDefinition;
  state: TriggerRuntimeState;
}

const logger = createLogger("TriggerRegistry");

function initialState(definition: TriggerDefinition): TriggerRuntimeState {
  return { enabled: definition.enabled, fired: false, hasFired: false, fireCount: 0, lastFiredTurn: null };
}

export class TriggerRegistry implements TriggerSwitch {
  private readonly byKind = new Map<EventKind, RegisteredTrigger[]>();
  private readonly byId = new Map<TriggerId, RegisteredTrigger>();

  constructor(private readonly runner: ActionRunner) {}

  register(definition: TriggerDefinition): this {
    if (this.byId.has(definition.id)) {
      throw new BundleValidationError(`Duplicate trigger id "${definition.id}"`);
    }
    const entry: RegisteredTrigger = { definition, state: initialState(definition) };
    this.byId.set(definition.id, entry);
    const bucket = this.byKind.get(definition.event.kind) ?? [];
    bucket.push(entry);
    this.byKind.set(definition.event.kind, bucket);
    return this;
  }

  registerAll(definitions: TriggerDefinition[]): this {
    definitions.forEach((definition) => this.register(definition));
    return this;
  }

  checkTriggers(event: GameEvent, world: WorldState, view: OutputView): TriggerId[] {
    const bucket = this.byKind.get(event.kind);
    if (!bucket) return [];
    const fired: TriggerId[] = [];
    for (const entry of [...bucket]) {
      const { definition, state } = entry;
      if (!state.enabled) continue;
      if (definition.fireOnce && state.fired) continue;
      if (!matchesEvent(definition.event, event)) continue;
      if (!evaluateCondition(definition.condition, world, { event, source: `trigger ${definition.id}` })) continue;

      if (definition.fireOnce) state.fired = true;
      state.hasFired = true;
      state.fireCount += 1;
      state.lastFiredTurn = world.turnCount;
      logger.info(`fired ${definition.id} (${definition.name}) on ${event.kind}`);
      this.runner.runActions(definition.actions, world, view, { triggerId: definition.id, parentEventId: null });
      fired.push(definition.id);
    }
    return fired;
  }

  setEnabled(id: TriggerId, enabled: boolean): boolean {
    const entry = this.byId.get(id);
    if (!entry) return false;
    entry.state.enabled = enabled;
    return true;
  }

  get(id: TriggerId): RegisteredTrigger | null {
    return this.byId.get(id) ?? null;
  }

  list(): RegisteredTrigger[] {
    return [...this.byId.values()];
  }

  captureState(): Record<TriggerId, TriggerRuntimeState> {
    const states: Record<TriggerId, TriggerRuntimeState> = {};
    this.byId.forEach((entry, id) => {
      states[id] = { ...entry.state };
    });
    return states;
  }

  assertKnown(ids: TriggerId[]): void {
    const unknown = ids.filter((id) => !this.byId.has(id));
    if (unknown.length > 0) {
      throw new SnapshotValidationError(`Snapshot names unknown triggers: ${unknown.join(", ")}`);
    }
  }

  restoreState(states: Record<TriggerId, TriggerRuntimeState>): void {
    this.assertKnown(Object.keys(states));
    this.byId.forEach((entry, id) => {
      const saved = states[id];
      entry.state = saved ? { ...saved } : initialState(entry.definition);
    });
  }
}
