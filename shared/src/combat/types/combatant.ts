/**
 * Odyssey Combat - Combatant Types
 *
 * Plain data shapes for combatant stats and pending effects.
 * The mutable model lives in engine/combatant.ts.
 */

import type { DamageOverTimeEffect, SlowEffect } from "./skill";

export type CombatantRole = "player" | "enemy";

// ═══════════════════════════════════════════════════════════════════════════
// STATS
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatantStats {
  /** Multiplier on outgoing skill power */
  attackMultiplier: number;
  /** Flat reduction on incoming damage (integer) */
  defenseReduction: number;
}

export const DEFAULT_STATS: CombatantStats = {
  attackMultiplier: 1,
  defenseReduction: 0,
};

// ═══════════════════════════════════════════════════════════════════════════
// PENDING EFFECTS
// ═══════════════════════════════════════════════════════════════════════════

export interface PendingDamageOverTime {
  kind: "damage_over_time";
  damagePerTurn: number;
  /** Ticks left */
  remaining: number;
  /** Skill that applied the effect */
  source: string;
}

export interface PendingSlow {
  kind: "slow";
  powerFactor: number;
  /** Attacks left */
  remaining: number;
  source: string;
}

export type PendingEffect = PendingDamageOverTime | PendingSlow;

export type PendingEffectKind = PendingEffect["kind"];

export function pendingFromDamageOverTime(
  effect: DamageOverTimeEffect,
  source: string
): PendingDamageOverTime {
  return {
    kind: "damage_over_time",
    damagePerTurn: effect.damagePerTurn,
    remaining: effect.turns,
    source,
  };
}

export function pendingFromSlow(effect: SlowEffect, source: string): PendingSlow {
  return {
    kind: "slow",
    powerFactor: effect.powerFactor,
    remaining: effect.turns,
    source,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CREATION INPUT
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatantInit {
  name: string;
  role: CombatantRole;
  maxHealth: number;
  /** Defaults to maxHealth */
  health?: number;
  skills?: string[];
  stats?: Partial<CombatantStats>;
}

export interface CombatantSnapshot {
  name: string;
  role: CombatantRole;
  health: number;
  maxHealth: number;
  skills: string[];
  stats: CombatantStats;
  effects: PendingEffect[];
}
