/**
 * Factories and fakes for engine tests.
 */

import { expect } from "vitest";
import type { Skill } from "../combat/types/skill";
import type { CombatantInit } from "../combat/types/combatant";
import type { EncounterController } from "../combat/types/encounter";
import type { CombatErrorCode } from "../combat/types/errors";
import { isCombatRuleError } from "../combat/types/errors";
import { Combatant } from "../combat/engine/combatant";
import { SkillRegistry } from "../combat/engine/skill-registry";
import type { Rng } from "../combat/engine/rng";

/**
 * A skill with no effect. Override any field via the overrides parameter.
 */
export function makeSkill(name: string, overrides: Partial<Skill> = {}): Skill {
  return {
    name,
    category: "Earth",
    power: 1,
    effect: { kind: "none" },
    ...overrides,
  };
}

export function makeRegistry(skills: Skill[]): SkillRegistry {
  const registry = new SkillRegistry();
  registry.registerAll(skills);
  return registry;
}

export function makePlayer(skills: string[], overrides: Partial<CombatantInit> = {}): Combatant {
  return new Combatant({ name: "You", role: "player", maxHealth: 20, skills, ...overrides });
}

export function makeEnemy(skills: string[], overrides: Partial<CombatantInit> = {}): Combatant {
  return new Combatant({ name: "Slime", role: "enemy", maxHealth: 10, skills, ...overrides });
}

/**
 * Plays the given skills in order, repeating the last one.
 */
export function scriptedController(choices: string[]): EncounterController {
  let index = 0;
  return {
    selectSkill() {
      const choice = choices[Math.min(index, choices.length - 1)];
      index++;
      return choice;
    },
  };
}

/**
 * Returns the given values in order and fails once they run out.
 */
export class FixedRng implements Rng {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    if (this.index >= this.values.length) {
      throw new Error(`FixedRng exhausted after ${this.values.length} values`);
    }
    return this.values[this.index++];
  }

  get consumed(): number {
    return this.index;
  }
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

export function expectRuleError(fn: () => unknown, code: CombatErrorCode): void {
  const error = captureError(fn);
  expect(isCombatRuleError(error)).toBe(true);
  expect(isCombatRuleError(error) ? error.code : undefined).toBe(code);
}
