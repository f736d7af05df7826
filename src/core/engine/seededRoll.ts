import type { WorldState } from "../../types/engine";

export function hashSeed(input: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < input.length; i += 1) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function seededRoll(seedInput: string): number {
  return (hashSeed(seedInput) % 10000) / 10000;
}

// Consumes one draw from the world's counter so a restored save replays the same rolls.
export function nextRoll(world: WorldState, label: string): number {
  const roll = seededRoll(`${world.meta.seed}:${world.turnCount}:${world.rng.counter}:${label}`);
  world.rng.counter += 1;
  return roll;
}

export function pickWeighted<T extends { weight: number }>(entries: T[], roll: number): T | null {
  const total = entries.reduce((sum, entry) => sum + Math.max(0, entry.weight), 0);
  if (entries.length === 0 || total <= 0) return null;
  let cursor = roll * total;
  for (const entry of entries) {
    cursor -= Math.max(0, entry.weight);
    if (cursor < 0) return entry;
  }
  return entries[entries.length - 1] ?? null;
}
