import { evaluateCondition, goalStatus } from "../core/conditions/ConditionEvaluator";
import type { Goal, GoalGroup, GoalId, GoalStatus, WorldState } from "../types/engine";

export interface GoalSummary {
  id: GoalId;
  name: string;
  group: GoalGroup;
  status: GoalStatus;
}

export class GoalTracker {
  statusOf(goal: Goal, world: WorldState): GoalStatus {
    const source = `goal ${goal.id}`;
    return goalStatus(goal, (condition) => evaluateCondition(condition, world, { source }));
  }

  summarize(world: WorldState): GoalSummary[] {
    return Object.values(world.goals).map((goal) => ({
      id: goal.id,
      name: goal.name,
      group: goal.group,
      status: this.statusOf(goal, world)
    }));
  }

  requiredComplete(world: WorldState): boolean {
    return this.summarize(world)
      .filter((goal) => goal.group === "required")
      .every((goal) => goal.status === "complete");
  }
}
