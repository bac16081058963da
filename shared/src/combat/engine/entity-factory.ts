/**
 * Odyssey Combat - Entity Factory
 *
 * Builds the player at game start and enemies at encounter start.
 * Deeper layers breed tougher foes.
 */

import { CombatRuleError } from "../types/errors";
import { Combatant } from "./combatant";
import type { SkillRegistry } from "./skill-registry";
import type { Rng } from "./rng";
import { pickOne, randomInt, sampleDistinct } from "./rng";

// ═══════════════════════════════════════════════════════════════════════════
// PLAYER
// ═══════════════════════════════════════════════════════════════════════════

export interface PlayerCreationOptions {
  name?: string;
  maxHealth?: number;
  /** Explicit starting skills; otherwise drawn at random */
  startingSkills?: string[];
  /** How many random basic skills to draw */
  startingSkillCount?: number;
}

export const DEFAULT_PLAYER_NAME = "You";
export const DEFAULT_PLAYER_MAX_HEALTH = 15;
export const DEFAULT_STARTING_SKILL_COUNT = 2;

export function createPlayer(
  registry: SkillRegistry,
  rng: Rng,
  options: PlayerCreationOptions = {}
): Combatant {
  const skills =
    options.startingSkills ??
    sampleDistinct(
      rng,
      registry.basicSkills(),
      options.startingSkillCount ?? DEFAULT_STARTING_SKILL_COUNT
    ).map((s) => s.name);

  for (const name of skills) registry.get(name);

  return new Combatant({
    name: options.name ?? DEFAULT_PLAYER_NAME,
    role: "player",
    maxHealth: options.maxHealth ?? DEFAULT_PLAYER_MAX_HEALTH,
    skills,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENEMIES
// ═══════════════════════════════════════════════════════════════════════════

export interface EnemyCreationOptions {
  /** Dungeon layer, -10 (bottom) to -1 */
  layer: number;
  names: readonly string[];
  minSkills?: number;
  maxSkills?: number;
}

export function enemyHealthForLayer(layer: number): number {
  return 5 + Math.max(0, -layer - 10) * 2;
}

export function createEnemy(
  registry: SkillRegistry,
  rng: Rng,
  options: EnemyCreationOptions
): Combatant {
  const pool = registry.basicSkills();
  if (pool.length === 0) {
    throw new CombatRuleError("INVALID_CONTENT", "No basic skills registered for enemies");
  }
  if (options.names.length === 0) {
    throw new CombatRuleError("INVALID_CONTENT", "No enemy names configured");
  }

  const name = pickOne(rng, options.names);
  const skillCount = randomInt(rng, options.minSkills ?? 1, options.maxSkills ?? 2);
  const skills = sampleDistinct(rng, pool, skillCount).map((s) => s.name);

  return new Combatant({
    name,
    role: "enemy",
    maxHealth: enemyHealthForLayer(options.layer),
    skills,
  });
}
