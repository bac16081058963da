/**
 * Odyssey Combat - Encounter Types
 *
 * Encounter state machine:
 *   ongoing -> player_victory
 *           -> player_defeat
 */

import type { CombatantRole, CombatantSnapshot, PendingEffectKind } from "./combatant";

// ═══════════════════════════════════════════════════════════════════════════
// PHASES & POLICIES
// ═══════════════════════════════════════════════════════════════════════════

export type EncounterPhase = "ongoing" | "player_victory" | "player_defeat";

export type EncounterOutcome = Exclude<EncounterPhase, "ongoing">;

/**
 * How an enemy picks its skill each turn.
 * first_known:   earliest acquired skill
 * highest_power: strongest known skill, ties go to the earliest acquired
 */
export type EnemySkillPolicy = "first_known" | "highest_power";

export const ENEMY_SKILL_POLICIES: readonly EnemySkillPolicy[] = [
  "first_known",
  "highest_power",
] as const;

export function isEnemySkillPolicy(value: unknown): value is EnemySkillPolicy {
  return typeof value === "string" && (ENEMY_SKILL_POLICIES as readonly string[]).includes(value);
}

export interface EncounterOptions {
  enemyPolicy?: EnemySkillPolicy;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMBAT LOG
// ═══════════════════════════════════════════════════════════════════════════

export interface SkillUsedEntry {
  type: "skill_used";
  round: number;
  actor: CombatantRole;
  skill: string;
  /** Damage before the target's defense */
  rawDamage: number;
  /** Health actually removed */
  damageDealt: number;
  targetHealth: number;
}

export interface EffectAppliedEntry {
  type: "effect_applied";
  round: number;
  target: CombatantRole;
  effect: PendingEffectKind;
  turns: number;
  /** True when an active effect of the same kind was refreshed */
  refreshed: boolean;
}

export interface EffectTickEntry {
  type: "effect_tick";
  round: number;
  target: CombatantRole;
  effect: "damage_over_time";
  damageDealt: number;
  targetHealth: number;
  remaining: number;
}

export interface EffectExpiredEntry {
  type: "effect_expired";
  round: number;
  target: CombatantRole;
  effect: PendingEffectKind;
}

export interface CombatantDefeatedEntry {
  type: "combatant_defeated";
  round: number;
  role: CombatantRole;
  name: string;
}

export type CombatLogEntry =
  | SkillUsedEntry
  | EffectAppliedEntry
  | EffectTickEntry
  | EffectExpiredEntry
  | CombatantDefeatedEntry;

// ═══════════════════════════════════════════════════════════════════════════
// REPORTS
// ═══════════════════════════════════════════════════════════════════════════

export interface TurnReport {
  round: number;
  phase: EncounterPhase;
  entries: CombatLogEntry[];
  playerHealth: number;
  enemyHealth: number;
}

export interface EncounterReport {
  outcome: EncounterOutcome;
  rounds: number;
  log: CombatLogEntry[];
  player: CombatantSnapshot;
  enemy: CombatantSnapshot;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTROLLERS (implemented by the presentation layer)
// ═══════════════════════════════════════════════════════════════════════════

export interface TurnContext {
  round: number;
  player: CombatantSnapshot;
  enemy: CombatantSnapshot;
}

export interface EncounterController {
  selectSkill(knownSkills: readonly string[], context: TurnContext): string;
}

export interface FusionController {
  /** null cancels the fusion */
  selectFusionPair(knownSkills: readonly string[]): [string, string] | null;
}

export interface AbsorptionController {
  /** Called only when the enemy knows skills the player lacks */
  selectAbsorption(candidates: readonly string[]): string;
}
