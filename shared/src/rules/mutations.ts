// Stat mutations for combatants. A mutation is a bundle of modifiers applied
// in order to the combatant's stat block; integer stats are truncated after
// every step so no fractional health or defense leaks out.

export type MutableStat = "attackMultiplier" | "defenseReduction" | "maxHealth";

export type StatOperation = "add" | "mul" | "set";

export interface StatModifier {
  stat: MutableStat;
  operation: StatOperation;
  value: number;
}

export interface Mutation {
  id: string;
  name: string;
  modifiers: StatModifier[];
  /** Restore health to the new maximum afterwards */
  healToFull?: boolean;
}

export interface StatBlock {
  attackMultiplier: number;
  defenseReduction: number;
  maxHealth: number;
}

const INTEGER_STATS: ReadonlySet<MutableStat> = new Set(["defenseReduction", "maxHealth"]);

export function applyStatModifiers(base: StatBlock, modifiers: StatModifier[]): StatBlock {
  const next: StatBlock = { ...base };
  for (const m of modifiers) {
    next[m.stat] = normalize(m.stat, applyOperation(next[m.stat], m.operation, m.value));
  }
  return next;
}

function applyOperation(current: number, op: StatOperation, value: number): number {
  switch (op) {
    case "add":
      return current + value;
    case "mul":
      return current * value;
    case "set":
      return value;
  }
}

function normalize(stat: MutableStat, value: number): number {
  const clamped = Math.max(0, Number.isFinite(value) ? value : 0);
  if (!INTEGER_STATS.has(stat)) return clamped;
  const truncated = Math.trunc(clamped);
  // a creature always keeps at least one hit point of capacity
  return stat === "maxHealth" ? Math.max(1, truncated) : truncated;
}

/**
 * Evolution after a hunt: +5 max health and a full heal.
 */
export const EVOLUTION: Mutation = {
  id: "evolution",
  name: "Evolution",
  modifiers: [{ stat: "maxHealth", operation: "add", value: 5 }],
  healToFull: true,
};
