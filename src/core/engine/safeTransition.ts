import type { WorldState } from "../../types/engine";
import { reportDiagnostic } from "../logging/diagnostics";
import type { StateMachine } from "./StateMachine";

export function safeTransition<S extends string>(machine: StateMachine<S>, world: WorldState, next: S, context: string): boolean {
  const from = machine.getState();
  const ok = machine.transition(next);
  if (!ok) {
    reportDiagnostic(world, "illegal-transition", context, `Invalid transition ${from} -> ${next}`);
    return false;
  }
  return true;
}
