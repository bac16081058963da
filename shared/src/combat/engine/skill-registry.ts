/**
 * Odyssey Combat - Skill Registry
 *
 * Catalogue of every skill the game knows about, in registration order.
 * Populated once at startup, then sealed.
 */

import type { Skill, SkillCategory, SkillEffect } from "../types/skill";
import { isSkillCategory } from "../types/skill";
import { CombatRuleError } from "../types/errors";

export class SkillRegistry {
  private readonly skills = new Map<string, Skill>();
  private sealed = false;

  /**
   * Register a skill. The stored record is a frozen copy.
   */
  register(skill: Skill): Skill {
    if (this.sealed) {
      throw new CombatRuleError(
        "INVALID_CONTENT",
        `Cannot register "${skill.name}": the skill registry is sealed`
      );
    }
    if (this.skills.has(skill.name)) {
      throw new CombatRuleError("DUPLICATE_SKILL", `Skill "${skill.name}" is already registered`, {
        name: skill.name,
      });
    }
    validateSkill(skill);

    const stored: Skill = Object.freeze({
      ...skill,
      effect: Object.freeze({ ...skill.effect }),
    });
    this.skills.set(stored.name, stored);
    return stored;
  }

  registerAll(skills: Iterable<Skill>): void {
    for (const skill of skills) this.register(skill);
  }

  get(name: string): Skill {
    const skill = this.skills.get(name);
    if (!skill) {
      throw new CombatRuleError("UNKNOWN_SKILL", `Unknown skill "${name}"`, { name });
    }
    return skill;
  }

  has(name: string): boolean {
    return this.skills.has(name);
  }

  all(): readonly Skill[] {
    return [...this.skills.values()];
  }

  byCategory(category: SkillCategory): readonly Skill[] {
    return this.all().filter((s) => s.category === category);
  }

  /**
   * Skills an unfused creature can be born with.
   */
  basicSkills(): readonly Skill[] {
    return this.all().filter((s) => s.category !== "Fusion");
  }

  get size(): number {
    return this.skills.size;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

function validateSkill(skill: Skill): void {
  const problems: string[] = [];

  if (skill.name.trim().length === 0) {
    problems.push("name must not be empty");
  }
  if (!isSkillCategory(skill.category)) {
    problems.push(`unknown category "${String(skill.category)}"`);
  }
  if (!isNonNegativeInteger(skill.power)) {
    problems.push(`power must be a non-negative integer (got ${skill.power})`);
  }
  problems.push(...validateEffect(skill.effect));

  if (problems.length > 0) {
    throw new CombatRuleError(
      "INVALID_CONTENT",
      `Invalid skill "${skill.name}": ${problems.join("; ")}`,
      { name: skill.name, problems }
    );
  }
}

function validateEffect(effect: SkillEffect): string[] {
  switch (effect.kind) {
    case "none":
      return [];
    case "damage_over_time":
      return [
        ...(isNonNegativeInteger(effect.damagePerTurn) ? [] : ["damagePerTurn must be a non-negative integer"]),
        ...(isPositiveInteger(effect.turns) ? [] : ["damage_over_time turns must be a positive integer"]),
      ];
    case "slow":
      return [
        ...(effect.powerFactor >= 0 && effect.powerFactor <= 1 ? [] : ["powerFactor must be between 0 and 1"]),
        ...(isPositiveInteger(effect.turns) ? [] : ["slow turns must be a positive integer"]),
      ];
    case "multi_target":
      return isPositiveInteger(effect.maxTargets) ? [] : ["maxTargets must be a positive integer"];
  }
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
