/**
 * Odyssey Combat - Skill Types
 *
 * Skills are registered once and referenced by name afterwards.
 * Effects are a closed tagged union; each kind has its own resolver.
 */

// ═══════════════════════════════════════════════════════════════════════════
// SKILL CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════

export type ElementCategory =
  | "Water"
  | "Wind"
  | "Earth"
  | "Fire"
  | "Venom"
  | "Lightning"
  | "Dark";

export type SkillCategory = ElementCategory | "Fusion";

export const SKILL_CATEGORIES: readonly SkillCategory[] = [
  "Water",
  "Wind",
  "Earth",
  "Fire",
  "Venom",
  "Lightning",
  "Dark",
  "Fusion",
] as const;

export function isSkillCategory(value: unknown): value is SkillCategory {
  return typeof value === "string" && (SKILL_CATEGORIES as readonly string[]).includes(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// SKILL EFFECTS
// ═══════════════════════════════════════════════════════════════════════════

export interface NoEffect {
  kind: "none";
}

export interface DamageOverTimeEffect {
  kind: "damage_over_time";
  /** Fixed damage dealt at the start of each of the target's turns */
  damagePerTurn: number;
  /** Number of ticks */
  turns: number;
}

export interface SlowEffect {
  kind: "slow";
  /** Multiplier on the target's outgoing damage, 0..1 */
  powerFactor: number;
  /** Number of the target's attacks affected */
  turns: number;
}

export interface MultiTargetEffect {
  kind: "multi_target";
  maxTargets: number;
}

export type SkillEffect =
  | NoEffect
  | DamageOverTimeEffect
  | SlowEffect
  | MultiTargetEffect;

export type SkillEffectKind = SkillEffect["kind"];

export const SKILL_EFFECT_KINDS: readonly SkillEffectKind[] = [
  "none",
  "damage_over_time",
  "slow",
  "multi_target",
] as const;

export const NO_EFFECT: NoEffect = Object.freeze({ kind: "none" });

// ═══════════════════════════════════════════════════════════════════════════
// SKILL
// ═══════════════════════════════════════════════════════════════════════════

export interface Skill {
  /** Unique identifier, also the display name */
  readonly name: string;
  readonly category: SkillCategory;
  /** Non-negative integer */
  readonly power: number;
  readonly effect: SkillEffect;
  readonly description?: string;
}

export function isFusionSkill(skill: Skill): boolean {
  return skill.category === "Fusion";
}

export function formatSkill(skill: Skill): string {
  const base = `${skill.name} (${skill.category}, power ${skill.power})`;
  return skill.description ? `${base} - ${skill.description}` : base;
}
