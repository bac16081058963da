/**
 * Odyssey Combat - Combatant Model
 *
 * Mutable state shared by the player and enemies: health, known skills,
 * stat modifiers and pending effects.
 */

import type {
  CombatantInit,
  CombatantRole,
  CombatantSnapshot,
  CombatantStats,
  PendingEffect,
  PendingEffectKind,
} from "../types/combatant";
import { DEFAULT_STATS } from "../types/combatant";
import { CombatRuleError } from "../types/errors";
import type { Mutation } from "../../rules/mutations";
import { applyStatModifiers } from "../../rules/mutations";

export class Combatant {
  readonly name: string;
  readonly role: CombatantRole;
  private currentHealth: number;
  private maximumHealth: number;
  private readonly skills: string[] = [];
  private currentStats: CombatantStats;
  private readonly effects = new Map<PendingEffectKind, PendingEffect>();

  constructor(init: CombatantInit) {
    if (!Number.isInteger(init.maxHealth) || init.maxHealth < 1) {
      throw new CombatRuleError(
        "INVALID_CONTENT",
        `Combatant "${init.name}" needs a positive integer max health (got ${init.maxHealth})`
      );
    }
    this.name = init.name;
    this.role = init.role;
    this.maximumHealth = init.maxHealth;
    this.currentHealth = clampHealth(init.health ?? init.maxHealth, init.maxHealth);
    this.currentStats = checkStats(init.name, { ...DEFAULT_STATS, ...init.stats });
    for (const skill of init.skills ?? []) this.learn(skill);
  }

  // ═════════════════════════════════════════════════════════════════════════
  // HEALTH
  // ═════════════════════════════════════════════════════════════════════════

  get health(): number {
    return this.currentHealth;
  }

  get maxHealth(): number {
    return this.maximumHealth;
  }

  /**
   * Apply incoming damage after flat defense reduction.
   * Returns the health actually removed.
   */
  takeDamage(amount: number): number {
    const mitigated = Math.max(0, Math.trunc(amount) - this.currentStats.defenseReduction);
    const removed = Math.min(this.currentHealth, mitigated);
    this.currentHealth -= removed;
    return removed;
  }

  /**
   * Returns the health actually restored.
   */
  heal(amount: number): number {
    const before = this.currentHealth;
    this.currentHealth = clampHealth(before + Math.max(0, Math.trunc(amount)), this.maximumHealth);
    return this.currentHealth - before;
  }

  isDefeated(): boolean {
    return this.currentHealth === 0;
  }

  // ═════════════════════════════════════════════════════════════════════════
  // SKILLS
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Append a skill if not already known. No-op otherwise.
   */
  learn(skillName: string): void {
    if (!this.skills.includes(skillName)) {
      this.skills.push(skillName);
    }
  }

  /**
   * Returns false if the skill was not known.
   */
  forget(skillName: string): boolean {
    const index = this.skills.indexOf(skillName);
    if (index === -1) return false;
    this.skills.splice(index, 1);
    return true;
  }

  knows(skillName: string): boolean {
    return this.skills.includes(skillName);
  }

  knownSkills(): readonly string[] {
    return [...this.skills];
  }

  // ═════════════════════════════════════════════════════════════════════════
  // STATS & MUTATIONS
  // ═════════════════════════════════════════════════════════════════════════

  get stats(): Readonly<CombatantStats> {
    return { ...this.currentStats };
  }

  applyMutation(mutation: Mutation): void {
    const next = applyStatModifiers(
      { ...this.currentStats, maxHealth: this.maximumHealth },
      mutation.modifiers
    );
    this.currentStats = {
      attackMultiplier: next.attackMultiplier,
      defenseReduction: next.defenseReduction,
    };
    this.maximumHealth = next.maxHealth;
    this.currentHealth = mutation.healToFull
      ? this.maximumHealth
      : clampHealth(this.currentHealth, this.maximumHealth);
  }

  // ═════════════════════════════════════════════════════════════════════════
  // PENDING EFFECTS (one instance per kind)
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Add or refresh an effect. Returns true if an active one was replaced.
   */
  addEffect(effect: PendingEffect): boolean {
    const refreshed = this.effects.has(effect.kind);
    this.effects.set(effect.kind, { ...effect });
    return refreshed;
  }

  getEffect<K extends PendingEffectKind>(kind: K): Extract<PendingEffect, { kind: K }> | undefined {
    const effect = this.effects.get(kind);
    return effect && isKind(effect, kind) ? effect : undefined;
  }

  removeEffect(kind: PendingEffectKind): void {
    this.effects.delete(kind);
  }

  activeEffects(): PendingEffect[] {
    return [...this.effects.values()].map((e) => ({ ...e }));
  }

  clearEffects(): void {
    this.effects.clear();
  }

  snapshot(): CombatantSnapshot {
    return {
      name: this.name,
      role: this.role,
      health: this.currentHealth,
      maxHealth: this.maximumHealth,
      skills: [...this.skills],
      stats: { ...this.currentStats },
      effects: this.activeEffects(),
    };
  }
}

function clampHealth(value: number, max: number): number {
  return Math.max(0, Math.min(max, Math.trunc(value)));
}

// Health stays integral only with a whole, non-negative defense.
function checkStats(name: string, stats: CombatantStats): CombatantStats {
  const { attackMultiplier, defenseReduction } = stats;
  if (!Number.isInteger(defenseReduction) || defenseReduction < 0) {
    throw new CombatRuleError(
      "INVALID_CONTENT",
      `Combatant "${name}" needs a non-negative integer defense reduction (got ${defenseReduction})`
    );
  }
  if (!Number.isFinite(attackMultiplier) || attackMultiplier < 0) {
    throw new CombatRuleError(
      "INVALID_CONTENT",
      `Combatant "${name}" needs a finite, non-negative attack multiplier (got ${attackMultiplier})`
    );
  }
  return stats;
}

function isKind<K extends PendingEffectKind>(
  effect: PendingEffect,
  kind: K
): effect is Extract<PendingEffect, { kind: K }> {
  return effect.kind === kind;
}
