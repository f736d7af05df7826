import { z } from "zod";
import type { Action, Condition, EventKind, EventMatcher, OnFalsePolicy } from "../types/engine";

export const EVENT_KINDS = [
  "always",
  "enterRoom",
  "leaveRoom",
  "takeItem",
  "dropItem",
  "lookAtItem",
  "openItem",
  "unlockItem",
  "touchItem",
  "talkToNpc",
  "useItem",
  "useItemOnItem",
  "giveToNpc",
  "takeFromNpc",
  "insertItemInto",
  "ingest",
  "playerDeath",
  "npcDeath"
] as const satisfies readonly EventKind[];

const id = z.string().min(1);

export const eventMatcherSchema: z.ZodType<EventMatcher> = z.object({
  kind: z.enum(EVENT_KINDS),
  params: z.record(z.string()).optional()
});

export const conditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("all"), children: z.array(conditionSchema) }),
    z.object({ kind: z.literal("any"), children: z.array(conditionSchema) }),
    z.object({ kind: z.literal("hasFlag"), flag: id }),
    z.object({ kind: z.literal("missingFlag"), flag: id }),
    z.object({ kind: z.literal("flagInProgress"), flag: id }),
    z.object({ kind: z.literal("flagComplete"), flag: id }),
    z.object({ kind: z.literal("hasItem"), item: id }),
    z.object({ kind: z.literal("missingItem"), item: id }),
    z.object({ kind: z.literal("hasVisited"), room: id }),
    z.object({ kind: z.literal("reachedRoom"), room: id }),
    z.object({ kind: z.literal("playerInRoom"), room: id }),
    z.object({ kind: z.literal("withNpc"), npc: id }),
    z.object({ kind: z.literal("npcHasItem"), npc: id, item: id }),
    z.object({ kind: z.literal("npcInState"), npc: id, state: z.string() }),
    z.object({ kind: z.literal("containerHasItem"), container: id, item: id }),
    z.object({ kind: z.literal("goalComplete"), goal: id }),
    z.object({ kind: z.literal("eventMatches"), event: eventMatcherSchema }),
    z.object({ kind: z.literal("chancePercent"), percent: z.number().min(0).max(100) }),
    z.object({ kind: z.literal("turnAtLeast"), turn: z.number().int().nonnegative() })
  ])
);

export const onFalseSchema: z.ZodType<OnFalsePolicy> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("cancel") }),
  z.object({ kind: z.literal("retryAfter"), turns: z.number() }),
  z.object({ kind: z.literal("retryNextTurn") })
]);

const scheduleFields = {
  actions: z.lazy(() => z.array(actionSchema)),
  condition: conditionSchema.optional(),
  onFalse: onFalseSchema.optional(),
  note: z.string().optional()
};

const healthFields = {
  amount: z.number().nonnegative(),
  cause: z.string().min(1),
  turns: z.number().int().positive().optional(),
  npc: id.optional()
};

export const actionSchema: z.ZodType<Action> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("showMessage"), text: z.string() }),
    z.object({
      kind: z.literal("addFlag"),
      flag: id,
      sequence: z.object({ end: z.number().int().positive().optional() }).optional()
    }),
    z.object({ kind: z.literal("advanceFlag"), flag: id }),
    z.object({ kind: z.literal("removeFlag"), flag: id }),
    z.object({ kind: z.literal("resetFlag"), flag: id }),
    z.object({ kind: z.literal("awardPoints"), amount: z.number().int(), reason: z.string().optional() }),
    z.object({ kind: z.literal("spawnItemInRoom"), item: id, room: id }),
    z.object({ kind: z.literal("spawnItemCurrentRoom"), item: id }),
    z.object({ kind: z.literal("spawnItemInInventory"), item: id }),
    z.object({ kind: z.literal("spawnItemInContainer"), item: id, container: id }),
    z.object({ kind: z.literal("despawnItem"), item: id }),
    z.object({ kind: z.literal("giveItemToPlayer"), npc: id, item: id }),
    z.object({ kind: z.literal("pushPlayerTo"), room: id }),
    z.object({ kind: z.literal("revealExit"), from: id, to: id, direction: id }),
    z.object({ kind: z.literal("lockExit"), from: id, direction: id }),
    z.object({ kind: z.literal("unlockExit"), from: id, direction: id }),
    z.object({ kind: z.literal("setBarredMessage"), from: id, direction: id, message: z.string() }),
    z.object({ kind: z.literal("lockItem"), item: id }),
    z.object({ kind: z.literal("unlockItem"), item: id }),
    z.object({ kind: z.literal("setItemDescription"), item: id, text: z.string() }),
    z.object({ kind: z.literal("setNpcState"), npc: id, state: z.string() }),
    z.object({ kind: z.literal("npcSays"), npc: id, quote: z.string() }),
    z.object({ kind: z.literal("npcSaysRandom"), npc: id }),
    z.object({ kind: z.literal("setNpcActive"), npc: id, active: z.boolean() }),
    z.object({ kind: z.literal("spinnerMessage"), spinner: id }),
    z.object({ kind: z.literal("damage"), ...healthFields }),
    z.object({ kind: z.literal("heal"), ...healthFields }),
    z.object({ kind: z.literal("removeEffect"), cause: z.string().min(1), npc: id.optional() }),
    z.object({ kind: z.literal("setTriggerEnabled"), trigger: id, enabled: z.boolean() }),
    z.object({ kind: z.literal("scheduleIn"), turns: z.number(), ...scheduleFields }),
    z.object({ kind: z.literal("scheduleAt"), turn: z.number().int(), ...scheduleFields }),
    z.object({
      kind: z.literal("scheduleEvery"),
      every: z.number().int().positive(),
      times: z.number().int().positive().optional(),
      ...scheduleFields
    })
  ])
);

const itemLocationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("room"), room: id }),
  z.object({ kind: z.literal("inventory") }),
  z.object({ kind: z.literal("npc"), npc: id }),
  z.object({ kind: z.literal("container"), container: id }),
  z.object({ kind: z.literal("nowhere") })
]);

const exitSchema = z.object({
  to: id,
  hidden: z.boolean().default(false),
  locked: z.boolean().default(false),
  barredMessage: z.string().nullable().default(null)
});

const roomSchema = z.object({
  id,
  name: z.string(),
  description: z.string().default(""),
  visited: z.boolean().default(false),
  exits: z.record(exitSchema).default({})
});

const itemSchema = z.object({
  id,
  name: z.string(),
  description: z.string().default(""),
  location: itemLocationSchema.default({ kind: "nowhere" }),
  container: z.enum(["open", "closed", "locked"]).nullable().default(null)
});

const movementSchema = z.object({
  pattern: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("route"), rooms: z.array(id).min(1), loop: z.boolean().default(true) }),
    z.object({ kind: z.literal("randomSet"), rooms: z.array(id).min(1) })
  ]),
  timing: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("everyNTurns"), turns: z.number().int().positive() }),
    z.object({ kind: z.literal("onTurn"), turn: z.number().int().nonnegative() })
  ]),
  active: z.boolean().default(true)
});

const npcSchema = z.object({
  id,
  name: z.string(),
  description: z.string().default(""),
  location: id.nullable().default(null),
  state: z.string().default("normal"),
  dialogue: z.record(z.array(z.string())).default({}),
  maxHp: z.number().int().positive().default(10),
  movement: movementSchema.nullable().default(null)
});

const goalSchema = z.object({
  id,
  name: z.string(),
  description: z.string().default(""),
  group: z.enum(["required", "optional", "statusEffect"]).default("required"),
  activateWhen: conditionSchema.nullable().default(null),
  finishedWhen: conditionSchema,
  failedWhen: conditionSchema.nullable().default(null)
});

const triggerSchema = z.object({
  id,
  name: z.string(),
  note: z.string().optional(),
  event: eventMatcherSchema,
  condition: conditionSchema.default({ kind: "all", children: [] }),
  actions: z.array(actionSchema),
  fireOnce: z.boolean().default(false),
  enabled: z.boolean().default(true)
});

export const worldBundleSchema = z.object({
  meta: z.object({
    title: z.string(),
    version: z.string().default("1"),
    seed: z.string().default("taletick")
  }),
  player: z.object({
    name: z.string().default("You"),
    start: id,
    maxHp: z.number().int().positive().default(20)
  }),
  rooms: z.array(roomSchema).min(1),
  items: z.array(itemSchema).default([]),
  npcs: z.array(npcSchema).default([]),
  goals: z.array(goalSchema).default([]),
  spinners: z.record(z.array(z.object({ text: z.string(), weight: z.number().nonnegative().default(1) }))).default({}),
  triggers: z.array(triggerSchema).default([])
});

export type WorldBundle = z.output<typeof worldBundleSchema>;
export type WorldBundleInput = z.input<typeof worldBundleSchema>;
