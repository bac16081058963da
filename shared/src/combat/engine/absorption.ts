/**
 * Odyssey Combat - Absorption & Fusion
 *
 * absorb: grant the player one skill from a defeated enemy
 * fuse:   combine two known skills through the fusion table
 */

import type { AvailableFusion, FusionOutcome } from "../types/fusion";
import type { AbsorptionController } from "../types/encounter";
import { CombatRuleError } from "../types/errors";
import { assertValid, validateFusionRequest } from "../validation/action-validator";
import type { Combatant } from "./combatant";
import type { FusionTable } from "./fusion-table";

// ═══════════════════════════════════════════════════════════════════════════
// ABSORPTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Skills the enemy knows that the player does not, in the enemy's order.
 */
export function absorptionCandidates(enemy: Combatant, player: Combatant): string[] {
  return enemy.knownSkills().filter((name) => !player.knows(name));
}

/**
 * Grant one of the defeated enemy's skills and return its name.
 *
 * Default pick is the enemy's earliest skill the player lacks. When the player
 * already knows everything, the enemy's first skill is re-learned as a no-op.
 * A chooser, if given, decides among the unknown candidates only.
 */
export function absorb(
  enemy: Combatant,
  player: Combatant,
  chooser?: AbsorptionController
): string {
  const enemySkills = enemy.knownSkills();
  const first = enemySkills[0];
  if (first === undefined) {
    throw new CombatRuleError("NO_ENEMY_SKILLS", `${enemy.name} has no skills to absorb`, {
      enemy: enemy.name,
    });
  }

  const candidates = absorptionCandidates(enemy, player);
  let granted = candidates[0] ?? first;

  if (chooser && candidates.length > 0) {
    const choice = chooser.selectAbsorption(candidates);
    if (!candidates.includes(choice)) {
      throw new CombatRuleError(
        "INVALID_ABSORPTION_CHOICE",
        `"${choice}" is not one of the skills ${enemy.name} can give (${candidates.join(", ")})`,
        { choice, candidates }
      );
    }
    granted = choice;
  }

  player.learn(granted);
  return granted;
}

// ═══════════════════════════════════════════════════════════════════════════
// FUSION
// ═══════════════════════════════════════════════════════════════════════════

export interface FuseOptions {
  /** Remove both component skills after a successful fusion */
  consumeComponents?: boolean;
}

/**
 * Fuse two skills the player knows.
 * A missing rule is a normal outcome, not an error; the player is untouched.
 */
export function fuse(
  player: Combatant,
  a: string,
  b: string,
  table: FusionTable,
  options: FuseOptions = {}
): FusionOutcome {
  assertValid(validateFusionRequest(player, a, b), { a, b });

  const lookup = table.lookup(a, b);
  if (!lookup.found) {
    return { status: "no_fusion_available", pair: [a, b] };
  }

  const consumed: string[] = [];
  if (options.consumeComponents) {
    for (const name of [a, b]) {
      if (player.forget(name)) consumed.push(name);
    }
  }
  player.learn(lookup.skill.name);

  return { status: "fused", skill: lookup.skill, consumed };
}

/**
 * Every pair of known skills that has a fusion rule, in known-skill order.
 */
export function listAvailableFusions(player: Combatant, table: FusionTable): AvailableFusion[] {
  const known = player.knownSkills();
  const fusions: AvailableFusion[] = [];

  for (let i = 0; i < known.length; i++) {
    for (let j = i + 1; j < known.length; j++) {
      const a = known[i];
      const b = known[j];
      const lookup = table.lookup(a, b);
      if (lookup.found) {
        fusions.push({ a, b, result: lookup.skill });
      }
    }
  }
  return fusions;
}
