import { z } from "zod";
import { ENGINE_DEFAULTS } from "../../config";
import { actionSchema, conditionSchema, onFalseSchema } from "../../content/bundleSchema";
import type { EngineSnapshot } from "../state/snapshot";

const EVENT_STATUSES = ["fired", "cancelled", "rescheduled"];
const POLICY_KINDS = ["cancel", "retryAfter", "retryNextTurn"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNullableNumber(value: unknown): boolean {
  return value === null || isNumber(value);
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === "string";
}

function isHealth(value: unknown): boolean {
  return isRecord(value)
    && isNumber(value.maxHp)
    && isNumber(value.currentHp)
    && typeof value.deceased === "boolean"
    && Array.isArray(value.effects);
}

function isScheduledEvent(value: unknown): boolean {
  if (!isRecord(value)) return false;
  if (!isNumber(value.id) || !isNumber(value.dueTurn) || !isNumber(value.scheduledTurn)) return false;
  if (!Array.isArray(value.actions) || !isNullableString(value.note)) return false;
  if (value.condition !== null && !isRecord(value.condition)) return false;
  if (!isRecord(value.onFalse) || !POLICY_KINDS.includes(String(value.onFalse.kind))) return false;
  if (!isRecord(value.origin) || !isNullableNumber(value.origin.parentEventId) || !isNullableString(value.origin.triggerId)) return false;
  return value.recurrence === null || isRecord(value.recurrence);
}

function isTombstone(value: unknown): boolean {
  return isRecord(value)
    && isNumber(value.eventId)
    && EVENT_STATUSES.includes(String(value.status))
    && isNumber(value.dueTurn)
    && isNumber(value.resolvedTurn)
    && isNullableNumber(value.nextEventId);
}

function isTriggerState(value: unknown): boolean {
  return isRecord(value)
    && typeof value.enabled === "boolean"
    && typeof value.fired === "boolean"
    && typeof value.hasFired === "boolean"
    && isNumber(value.fireCount)
    && isNullableNumber(value.lastFiredTurn);
}

export function validateSnapshotCandidate(candidate: unknown): candidate is EngineSnapshot {
  if (!isRecord(candidate) || candidate.version !== 1) return false;

  const world = candidate.world;
  if (!isRecord(world) || !isNumber(world.turnCount)) return false;
  if (!isRecord(world.meta) || typeof world.meta.seed !== "string" || typeof world.meta.title !== "string") return false;
  if (!isRecord(world.clock) || !isNumber(world.clock.lastProcessedTurn)) return false;
  if (!isRecord(world.rng) || !isNumber(world.rng.counter)) return false;

  const player = world.player;
  if (!isRecord(player) || typeof player.location !== "string" || typeof player.name !== "string") return false;
  if (!isNumber(player.score) || !isRecord(player.flags) || !isHealth(player.health)) return false;

  if (!isRecord(world.rooms) || !isRecord(world.items) || !isRecord(world.npcs)) return false;
  if (!isRecord(world.goals) || !isRecord(world.spinners) || !Array.isArray(world.diagnostics)) return false;
  if (!Object.values(world.npcs).every((npc) => isRecord(npc) && isHealth(npc.health))) return false;

  if (!isRecord(candidate.triggers) || !Object.values(candidate.triggers).every(isTriggerState)) return false;

  const scheduler = candidate.scheduler;
  if (!isRecord(scheduler) || !isNumber(scheduler.nextId)) return false;
  if (!Array.isArray(scheduler.pending) || !scheduler.pending.every(isScheduledEvent)) return false;
  if (!Array.isArray(scheduler.tombstones) || !scheduler.tombstones.every(isTombstone)) return false;
  return true;
}

const pendingBodySchema = z.object({
  condition: conditionSchema.nullable(),
  actions: z.array(actionSchema),
  onFalse: onFalseSchema,
  recurrence: z.object({
    every: z.number().int().positive(),
    remaining: z.number().int().nonnegative().nullable()
  }).nullable()
});

export function pendingEventIssues(event: unknown): string[] {
  const result = pendingBodySchema.safeParse(event);
  if (result.success) return [];
  return result.error.issues.map((issue) => `${issue.path.join(".") || "event"}: ${issue.message}`);
}

export function normalizeSnapshot(candidate: unknown): EngineSnapshot | null {
  if (!validateSnapshotCandidate(candidate)) return null;
  const snapshot = structuredClone(candidate);
  snapshot.world.diagnostics = snapshot.world.diagnostics.slice(-ENGINE_DEFAULTS.diagnosticsLimit);
  return snapshot;
}
