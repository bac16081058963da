// Plain-text lines for combat log entries, used by the headless runner.

import type { CombatantRole } from "@shared/combat/types/combatant";
import type { CombatLogEntry, EncounterOutcome } from "@shared/combat/types/encounter";

export interface NarrationNames {
  player: string;
  enemy: string;
}

const EFFECT_LABELS = {
  damage_over_time: "damage over time",
  slow: "slow",
} as const;

export function describeLogEntry(entry: CombatLogEntry, names: NarrationNames): string {
  const who = (role: CombatantRole) => names[role];
  const other = (role: CombatantRole) => names[role === "player" ? "enemy" : "player"];

  switch (entry.type) {
    case "skill_used":
      return `${who(entry.actor)} used ${entry.skill} on ${other(entry.actor)} for ${entry.damageDealt} damage (HP ${entry.targetHealth})`;
    case "effect_applied":
      return `${who(entry.target)} ${entry.refreshed ? "is again" : "is now"} affected by ${EFFECT_LABELS[entry.effect]} for ${entry.turns} turn(s)`;
    case "effect_tick":
      return `${who(entry.target)} suffers ${entry.damageDealt} lingering damage (HP ${entry.targetHealth})`;
    case "effect_expired":
      return `${EFFECT_LABELS[entry.effect]} on ${who(entry.target)} wore off`;
    case "combatant_defeated":
      return `${entry.name} was defeated`;
  }
}

export function describeOutcome(outcome: EncounterOutcome, enemyName: string): string {
  return outcome === "player_victory"
    ? `You defeated the ${enemyName}!`
    : `The ${enemyName} has defeated you...`;
}
