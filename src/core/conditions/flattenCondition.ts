import type { Action, CompositeCondition, Condition } from "../../types/engine";

function isComposite(condition: Condition): condition is CompositeCondition {
  return condition.kind === "all" || condition.kind === "any";
}

export function flattenCondition(condition: Condition): Condition {
  if (!isComposite(condition)) return condition;
  const children: Condition[] = [];
  for (const child of condition.children) {
    const flat = flattenCondition(child);
    if (isComposite(flat) && flat.kind === condition.kind) {
      children.push(...flat.children);
    } else {
      children.push(flat);
    }
  }
  return condition.kind === "all" ? { kind: "all", children } : { kind: "any", children };
}

// Conditions nested inside schedule actions are flattened too.
export function flattenActions(actions: Action[]): Action[] {
  return actions.map((action) => {
    if (action.kind !== "scheduleIn" && action.kind !== "scheduleAt" && action.kind !== "scheduleEvery") {
      return action;
    }
    return {
      ...action,
      ...(action.condition ? { condition: flattenCondition(action.condition) } : {}),
      actions: flattenActions(action.actions)
    };
  });
}
