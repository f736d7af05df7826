import type { EventStatus } from "../../types/engine";

export type TransitionTable<S extends string> = Record<S, readonly S[]>;

export const EVENT_LIFECYCLE: TransitionTable<EventStatus> = {
  pending: ["fired", "cancelled", "rescheduled"],
  fired: [],
  cancelled: [],
  rescheduled: []
};

export class StateMachine<S extends string> {
  private state: S;

  constructor(private readonly transitions: TransitionTable<S>, initialState: S) {
    this.state = initialState;
  }

  getState(): S {
    return this.state;
  }

  canTransition(next: S): boolean {
    return this.transitions[this.state].includes(next);
  }

  transition(next: S): boolean {
    if (!this.canTransition(next)) {
      return false;
    }
    this.state = next;
    return true;
  }
}
