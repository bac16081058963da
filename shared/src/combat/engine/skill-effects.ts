/**
 * Odyssey Combat - Skill Effects
 *
 * One resolver per effect kind. Damage-over-time and slow become pending
 * effects on the target; reapplying refreshes the duration instead of stacking.
 */

import type {
  DamageOverTimeEffect,
  MultiTargetEffect,
  Skill,
  SkillEffect,
  SlowEffect,
} from "../types/skill";
import { pendingFromDamageOverTime, pendingFromSlow } from "../types/combatant";
import type { CombatLogEntry } from "../types/encounter";
import type { Combatant } from "./combatant";

// ═══════════════════════════════════════════════════════════════════════════
// DAMAGE FORMULA
// ═══════════════════════════════════════════════════════════════════════════

/**
 * power × attack multiplier × slow factor, truncated toward zero.
 */
export function computeSkillDamage(skill: Skill, attacker: Combatant, powerFactor = 1): number {
  return Math.max(0, Math.trunc(skill.power * attacker.stats.attackMultiplier * powerFactor));
}

// ═══════════════════════════════════════════════════════════════════════════
// TARGETING
// ═══════════════════════════════════════════════════════════════════════════

export function selectTargets(effect: SkillEffect, opponents: readonly Combatant[]): Combatant[] {
  const alive = opponents.filter((c) => !c.isDefeated());
  if (effect.kind === "multi_target") {
    return alive.slice(0, effect.maxTargets);
  }
  return alive.slice(0, 1);
}

// ═══════════════════════════════════════════════════════════════════════════
// ON-HIT APPLICATION
// ═══════════════════════════════════════════════════════════════════════════

export interface EffectContext {
  round: number;
  skill: Skill;
  target: Combatant;
}

export function applySkillEffect(ctx: EffectContext): CombatLogEntry[] {
  const { effect } = ctx.skill;
  switch (effect.kind) {
    case "none":
      return [];
    case "damage_over_time":
      return applyDamageOverTime(effect, ctx);
    case "slow":
      return applySlow(effect, ctx);
    case "multi_target":
      return applyMultiTarget(effect, ctx);
  }
}

function applyDamageOverTime(effect: DamageOverTimeEffect, ctx: EffectContext): CombatLogEntry[] {
  const refreshed = ctx.target.addEffect(pendingFromDamageOverTime(effect, ctx.skill.name));
  return [
    {
      type: "effect_applied",
      round: ctx.round,
      target: ctx.target.role,
      effect: "damage_over_time",
      turns: effect.turns,
      refreshed,
    },
  ];
}

function applySlow(effect: SlowEffect, ctx: EffectContext): CombatLogEntry[] {
  const refreshed = ctx.target.addEffect(pendingFromSlow(effect, ctx.skill.name));
  return [
    {
      type: "effect_applied",
      round: ctx.round,
      target: ctx.target.role,
      effect: "slow",
      turns: effect.turns,
      refreshed,
    },
  ];
}

// Spread happens in selectTargets; nothing lingers on the target.
function applyMultiTarget(_effect: MultiTargetEffect, _ctx: EffectContext): CombatLogEntry[] {
  return [];
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN-START / ON-ATTACK PROCESSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Tick a pending damage-over-time effect at the start of the bearer's turn.
 */
export function tickDamageOverTime(bearer: Combatant, round: number): CombatLogEntry[] {
  const dot = bearer.getEffect("damage_over_time");
  if (!dot) return [];

  const damageDealt = bearer.takeDamage(dot.damagePerTurn);
  dot.remaining -= 1;

  const entries: CombatLogEntry[] = [
    {
      type: "effect_tick",
      round,
      target: bearer.role,
      effect: "damage_over_time",
      damageDealt,
      targetHealth: bearer.health,
      remaining: dot.remaining,
    },
  ];

  if (dot.remaining <= 0) {
    bearer.removeEffect("damage_over_time");
    entries.push({ type: "effect_expired", round, target: bearer.role, effect: "damage_over_time" });
  }
  return entries;
}

/**
 * Consume one charge of slow from an attacker about to act.
 */
export function consumeSlow(
  attacker: Combatant,
  round: number
): { powerFactor: number; entries: CombatLogEntry[] } {
  const slow = attacker.getEffect("slow");
  if (!slow) return { powerFactor: 1, entries: [] };

  const { powerFactor } = slow;
  slow.remaining -= 1;
  if (slow.remaining > 0) return { powerFactor, entries: [] };

  attacker.removeEffect("slow");
  return {
    powerFactor,
    entries: [{ type: "effect_expired", round, target: attacker.role, effect: "slow" }],
  };
}
