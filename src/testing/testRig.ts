import type { WorldBundleInput } from "../content/bundleSchema";
import type { ActionRunner } from "../core/actions/contracts";
import { ActionExecutor } from "../core/actions/ActionExecutor";
import { Scheduler, type SchedulerOptions } from "../core/scheduler/Scheduler";
import { TriggerRegistry } from "../core/triggers/TriggerRegistry";
import { OutputView } from "../core/view/OutputView";
import type { TriggerDefinition } from "../types/engine";
import { createTestWorld } from "./testBundle";

export function createTestRig(overrides: Partial<WorldBundleInput> = {}, options: SchedulerOptions = {}) {
  const world = createTestWorld(overrides);
  const view = new OutputView();
  const runner: ActionRunner = {
    runActions: (actions, w, v, origin) => executor.runActions(actions, w, v, origin)
  };
  const scheduler = new Scheduler(runner, options);
  const registry = new TriggerRegistry(runner);
  const executor = new ActionExecutor({ scheduler, triggers: registry });
  return { world, view, scheduler, registry, executor };
}

export function testTrigger(overrides: Partial<TriggerDefinition> & Pick<TriggerDefinition, "id">): TriggerDefinition {
  return {
    name: overrides.id,
    event: { kind: "always" },
    condition: { kind: "all", children: [] },
    actions: [],
    fireOnce: false,
    enabled: true,
    ...overrides
  };
}

export function texts(view: OutputView): string[] {
  return view.pending().map((item) => item.text);
}
