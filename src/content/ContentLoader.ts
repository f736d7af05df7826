import { readFile } from "node:fs/promises";
import { flattenActions, flattenCondition } from "../core/conditions/flattenCondition";
import { BundleValidationError } from "../core/errors";
import { createLogger } from "../core/logging/logger";
import { worldBundleSchema, type WorldBundle } from "./bundleSchema";

const logger = createLogger("ContentLoader");

function duplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  ids.forEach((value) => {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  });
  return [...repeated];
}

function referenceIssues(bundle: WorldBundle): string[] {
  const rooms = new Set(bundle.rooms.map((room) => room.id));
  const items = new Set(bundle.items.map((item) => item.id));
  const npcs = new Set(bundle.npcs.map((npc) => npc.id));
  const issues: string[] = [];

  if (!rooms.has(bundle.player.start)) issues.push(`player.start: unknown room "${bundle.player.start}"`);
  bundle.rooms.forEach((room) => {
    Object.entries(room.exits).forEach(([direction, exit]) => {
      if (!rooms.has(exit.to)) issues.push(`rooms.${room.id}.exits.${direction}: unknown room "${exit.to}"`);
    });
  });
  bundle.items.forEach((item) => {
    const { location } = item;
    if (location.kind === "room" && !rooms.has(location.room)) issues.push(`items.${item.id}: unknown room "${location.room}"`);
    if (location.kind === "npc" && !npcs.has(location.npc)) issues.push(`items.${item.id}: unknown npc "${location.npc}"`);
    if (location.kind === "container" && !items.has(location.container)) {
      issues.push(`items.${item.id}: unknown container "${location.container}"`);
    }
  });
  bundle.npcs.forEach((npc) => {
    if (npc.location !== null && !rooms.has(npc.location)) issues.push(`npcs.${npc.id}: unknown room "${npc.location}"`);
    npc.movement?.pattern.rooms.forEach((room) => {
      if (!rooms.has(room)) issues.push(`npcs.${npc.id}.movement: unknown room "${room}"`);
    });
  });
  return issues;
}

export function parseWorldBundle(candidate: unknown): WorldBundle {
  const result = worldBundleSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "bundle"}: ${issue.message}`);
    throw new BundleValidationError("World bundle failed validation", issues);
  }
  const bundle = result.data;

  const issues: string[] = [];
  const collections: Array<[string, string[]]> = [
    ["room", bundle.rooms.map((room) => room.id)],
    ["item", bundle.items.map((item) => item.id)],
    ["npc", bundle.npcs.map((npc) => npc.id)],
    ["goal", bundle.goals.map((goal) => goal.id)],
    ["trigger", bundle.triggers.map((trigger) => trigger.id)]
  ];
  collections.forEach(([label, ids]) => {
    duplicates(ids).forEach((dup) => issues.push(`duplicate ${label} id "${dup}"`));
  });
  issues.push(...referenceIssues(bundle));
  if (issues.length > 0) throw new BundleValidationError("World bundle failed validation", issues);

  return {
    ...bundle,
    goals: bundle.goals.map((goal) => ({
      ...goal,
      activateWhen: goal.activateWhen ? flattenCondition(goal.activateWhen) : null,
      finishedWhen: flattenCondition(goal.finishedWhen),
      failedWhen: goal.failedWhen ? flattenCondition(goal.failedWhen) : null
    })),
    triggers: bundle.triggers.map((trigger) => ({
      ...trigger,
      condition: flattenCondition(trigger.condition),
      actions: flattenActions(trigger.actions)
    }))
  };
}

export async function loadWorldBundle(path: string): Promise<WorldBundle> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    logger.error(`Failed to read world bundle: ${path}`, { err });
    throw new BundleValidationError(`Failed to read world bundle: ${path}`);
  }
  let candidate: unknown;
  try {
    candidate = JSON.parse(raw);
  } catch (err) {
    logger.error(`World bundle is not valid JSON: ${path}`, { err });
    throw new BundleValidationError(`World bundle is not valid JSON: ${path}`);
  }
  try {
    return parseWorldBundle(candidate);
  } catch (err) {
    logger.error(`World bundle rejected: ${path}`, { err });
    throw err;
  }
}
