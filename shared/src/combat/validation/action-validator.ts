/**
 * Odyssey Combat - Action Validator
 *
 * Checks that player requests are legal before the engine mutates anything.
 * Validators are pure; engine entry points turn failures into CombatRuleErrors.
 */

import type { CombatErrorCode } from "../types/errors";
import { CombatRuleError } from "../types/errors";
import type { Combatant } from "../engine/combatant";
import type { SkillRegistry } from "../engine/skill-registry";

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidationResult {
  /** Whether the action is valid */
  valid: boolean;
  /** Error messages if invalid */
  errors: string[];
  /** Warnings that don't prevent the action */
  warnings: string[];
  /** Error code raised when the result is enforced */
  code?: CombatErrorCode;
}

function validResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

function invalidResult(code: CombatErrorCode, ...errors: string[]): ValidationResult {
  return { valid: false, errors, warnings: [], code };
}

function addWarning(result: ValidationResult, warning: string): ValidationResult {
  return { ...result, warnings: [...result.warnings, warning] };
}

/**
 * Throw the result's error if it is invalid.
 */
export function assertValid(result: ValidationResult, info?: unknown): void {
  if (result.valid) return;
  throw new CombatRuleError(result.code ?? "INVALID_ENCOUNTER", result.errors.join("; "), info);
}

// ═══════════════════════════════════════════════════════════════════════════
// SKILL CHOICE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The actor must know the skill and the skill must be registered.
 */
export function validateSkillChoice(
  actor: Combatant,
  skillName: string,
  registry: SkillRegistry
): ValidationResult {
  if (!actor.knows(skillName)) {
    return invalidResult(
      "UNKNOWN_OR_UNLEARNED_SKILL",
      `${actor.name} has not learned "${skillName}"`
    );
  }
  if (!registry.has(skillName)) {
    return invalidResult("UNKNOWN_OR_UNLEARNED_SKILL", `"${skillName}" is not a registered skill`);
  }
  return validResult();
}

// ═══════════════════════════════════════════════════════════════════════════
// FUSION REQUEST
// ═══════════════════════════════════════════════════════════════════════════

export function validateFusionRequest(fuser: Combatant, a: string, b: string): ValidationResult {
  const unlearned = [a, b].filter((name) => !fuser.knows(name));
  if (unlearned.length > 0) {
    return invalidResult(
      "UNLEARNED_SKILL",
      ...unlearned.map((name) => `${fuser.name} has not learned "${name}"`)
    );
  }
  if (a === b) {
    return invalidResult("INVALID_FUSION_REQUEST", `Cannot fuse "${a}" with itself`);
  }
  return validResult();
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCOUNTER START
// ═══════════════════════════════════════════════════════════════════════════

export function validateEncounterStart(player: Combatant, enemy: Combatant): ValidationResult {
  const errors: string[] = [];

  if (player.role !== "player") errors.push(`${player.name} is not the player`);
  if (enemy.role !== "enemy") errors.push(`${enemy.name} is not an enemy`);
  if (player.isDefeated()) errors.push(`${player.name} is already defeated`);
  if (enemy.isDefeated()) errors.push(`${enemy.name} is already defeated`);
  if (player.knownSkills().length === 0) errors.push(`${player.name} knows no skills`);

  if (errors.length > 0) {
    return invalidResult("INVALID_ENCOUNTER", ...errors);
  }

  if (enemy.knownSkills().length === 0) {
    return addWarning(validResult(), `${enemy.name} knows no skills and will not attack`);
  }
  return validResult();
}
