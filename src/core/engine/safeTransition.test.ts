import { describe, expect, it } from "vitest";
import { createTestWorld } from "../../testing/testBundle";
import { EVENT_LIFECYCLE, StateMachine } from "./StateMachine";
import { safeTransition } from "./safeTransition";

describe("safeTransition", () => {
  it("applies valid transitions", () => {
    const world = createTestWorld();
    const machine = new StateMachine(EVENT_LIFECYCLE, "pending");
    const ok = safeTransition(machine, world, "fired", "unit-test-valid");
    expect(ok).toBe(true);
    expect(machine.getState()).toBe("fired");
    expect(world.diagnostics).toEqual([]);
  });

  it("rejects invalid transitions and records a diagnostic", () => {
    const world = createTestWorld();
    const machine = new StateMachine(EVENT_LIFECYCLE, "fired");
    const ok = safeTransition(machine, world, "rescheduled", "unit-test-invalid");
    expect(ok).toBe(false);
    expect(machine.getState()).toBe("fired");
    expect(world.diagnostics.at(-1)).toEqual({
      code: "illegal-transition",
      source: "unit-test-invalid",
      message: "Invalid transition fired -> rescheduled",
      turn: 0
    });
  });
});
