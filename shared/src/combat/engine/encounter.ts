/**
 * Odyssey Combat - Encounter Resolver
 *
 * Strict alternation, player first. Each round:
 *   1. player's damage-over-time ticks
 *   2. player uses the chosen skill
 *   3. enemy's damage-over-time ticks
 *   4. enemy uses a skill picked by the enemy policy
 * The encounter ends the moment either side reaches 0 health.
 * No randomness: identical choices and stats give identical health sequences.
 */

import type { Skill } from "../types/skill";
import type { CombatantSnapshot } from "../types/combatant";
import type {
  CombatLogEntry,
  EncounterController,
  EncounterOptions,
  EncounterOutcome,
  EncounterPhase,
  EncounterReport,
  EnemySkillPolicy,
  TurnContext,
  TurnReport,
} from "../types/encounter";
import { CombatRuleError } from "../types/errors";
import { assertValid, validateEncounterStart, validateSkillChoice } from "../validation/action-validator";
import type { Combatant } from "./combatant";
import type { SkillRegistry } from "./skill-registry";
import {
  applySkillEffect,
  computeSkillDamage,
  consumeSlow,
  selectTargets,
  tickDamageOverTime,
} from "./skill-effects";

export const DEFAULT_ENEMY_POLICY: EnemySkillPolicy = "first_known";

// ═══════════════════════════════════════════════════════════════════════════
// ENEMY SKILL SELECTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Returns undefined when the enemy knows no skills.
 */
export function selectEnemySkill(
  enemy: Combatant,
  registry: SkillRegistry,
  policy: EnemySkillPolicy = DEFAULT_ENEMY_POLICY
): Skill | undefined {
  const known = enemy.knownSkills().map((name) => registry.get(name));
  if (known.length === 0) return undefined;

  switch (policy) {
    case "first_known":
      return known[0];
    case "highest_power":
      // strict comparison keeps the earliest acquired on ties
      return known.reduce((best, skill) => (skill.power > best.power ? skill : best));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCOUNTER STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════

interface FinalState {
  outcome: EncounterOutcome;
  player: CombatantSnapshot;
  enemy: CombatantSnapshot;
}

export class Encounter {
  private currentPhase: EncounterPhase = "ongoing";
  private round = 0;
  private readonly log: CombatLogEntry[] = [];
  private final: FinalState | null = null;
  private readonly enemyPolicy: EnemySkillPolicy;
  readonly warnings: string[];

  constructor(
    readonly player: Combatant,
    readonly enemy: Combatant,
    private readonly registry: SkillRegistry,
    options: EncounterOptions = {}
  ) {
    const start = validateEncounterStart(player, enemy);
    assertValid(start, { player: player.name, enemy: enemy.name });
    this.warnings = start.warnings;
    this.enemyPolicy = options.enemyPolicy ?? DEFAULT_ENEMY_POLICY;
  }

  get phase(): EncounterPhase {
    return this.currentPhase;
  }

  /** Rounds started so far */
  get rounds(): number {
    return this.round;
  }

  isOver(): boolean {
    return this.currentPhase !== "ongoing";
  }

  context(): TurnContext {
    return {
      round: this.round + 1,
      player: this.player.snapshot(),
      enemy: this.enemy.snapshot(),
    };
  }

  /**
   * Resolve one full round with the player's chosen skill.
   * An illegal choice throws before anything changes.
   */
  playTurn(skillName: string): TurnReport {
    if (this.isOver()) {
      throw new CombatRuleError("ENCOUNTER_OVER", `The encounter already ended (${this.currentPhase})`);
    }
    assertValid(validateSkillChoice(this.player, skillName, this.registry), { skill: skillName });
    const playerSkill = this.registry.get(skillName);

    this.round += 1;
    const round = this.round;
    const entries: CombatLogEntry[] = [];

    entries.push(...tickDamageOverTime(this.player, round));
    if (this.player.isDefeated()) {
      return this.finishTurn(entries, "player_defeat");
    }

    entries.push(...this.act(this.player, this.enemy, playerSkill, round));
    if (this.enemy.isDefeated()) {
      return this.finishTurn(entries, "player_victory");
    }

    entries.push(...tickDamageOverTime(this.enemy, round));
    if (this.enemy.isDefeated()) {
      return this.finishTurn(entries, "player_victory");
    }

    const enemySkill = selectEnemySkill(this.enemy, this.registry, this.enemyPolicy);
    if (enemySkill) {
      entries.push(...this.act(this.enemy, this.player, enemySkill, round));
      if (this.player.isDefeated()) {
        return this.finishTurn(entries, "player_defeat");
      }
    }

    return this.finishTurn(entries, "ongoing");
  }

  combatLog(): readonly CombatLogEntry[] {
    return [...this.log];
  }

  report(): EncounterReport {
    if (!this.final) {
      throw new CombatRuleError("INVALID_ENCOUNTER", "The encounter is still ongoing");
    }
    return {
      outcome: this.final.outcome,
      rounds: this.round,
      log: [...this.log],
      player: this.final.player,
      enemy: this.final.enemy,
    };
  }

  // ═════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═════════════════════════════════════════════════════════════════════════

  private act(attacker: Combatant, opponent: Combatant, skill: Skill, round: number): CombatLogEntry[] {
    const slow = consumeSlow(attacker, round);
    const entries: CombatLogEntry[] = [...slow.entries];
    const rawDamage = computeSkillDamage(skill, attacker, slow.powerFactor);

    for (const target of selectTargets(skill.effect, [opponent])) {
      const damageDealt = target.takeDamage(rawDamage);
      entries.push({
        type: "skill_used",
        round,
        actor: attacker.role,
        skill: skill.name,
        rawDamage,
        damageDealt,
        targetHealth: target.health,
      });
      if (!target.isDefeated()) {
        entries.push(...applySkillEffect({ round, skill, target }));
      }
    }
    return entries;
  }

  private finishTurn(entries: CombatLogEntry[], phase: EncounterPhase): TurnReport {
    if (phase !== "ongoing") {
      const loser = phase === "player_victory" ? this.enemy : this.player;
      entries.push({ type: "combatant_defeated", round: this.round, role: loser.role, name: loser.name });
      this.final = {
        outcome: phase,
        player: this.player.snapshot(),
        enemy: this.enemy.snapshot(),
      };
      // lingering effects never follow the player into the next encounter
      this.player.clearEffects();
    }
    this.currentPhase = phase;
    this.log.push(...entries);

    return {
      round: this.round,
      phase,
      entries,
      playerHealth: this.player.health,
      enemyHealth: this.enemy.health,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FULL ENCOUNTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Ask the controller for player moves until the encounter ends.
 * A rejected choice propagates with the encounter left as it was, so the
 * caller can ask again and call this once more.
 */
export function playUntilOver(encounter: Encounter, controller: EncounterController): EncounterReport {
  while (!encounter.isOver()) {
    const choice = controller.selectSkill(encounter.player.knownSkills(), encounter.context());
    encounter.playTurn(choice);
  }
  return encounter.report();
}

/**
 * Run a one-shot encounter to completion.
 * A rejected choice abandons it; the player's lingering effects are dropped
 * either way.
 */
export function runEncounter(
  player: Combatant,
  enemy: Combatant,
  controller: EncounterController,
  registry: SkillRegistry,
  options: EncounterOptions = {}
): EncounterReport {
  const encounter = new Encounter(player, enemy, registry, options);
  try {
    return playUntilOver(encounter, controller);
  } finally {
    player.clearEffects();
  }
}

/**
 * Controller that always uses the player's earliest acquired skill.
 */
export const firstKnownSkillController: EncounterController = {
  selectSkill(knownSkills) {
    const first = knownSkills[0];
    if (first === undefined) {
      throw new CombatRuleError("UNKNOWN_OR_UNLEARNED_SKILL", "No known skill to select");
    }
    return first;
  },
};
