// Headless playthrough: the player always uses their strongest known skill,
// fuses whenever a fusion is on offer and climbs after every won fight.
// Set ODYSSEY_SEED for a reproducible run.

import dotenv from "dotenv";
import type { EncounterController } from "@shared/combat/types/encounter";
import { formatSkill } from "@shared/combat/types/skill";
import type { GameSession } from "@shared/combat/engine/game-session";
import { createSession, describeLogEntry, describeOutcome, loadConfig } from "../index";

const MAX_EXPLORATIONS = 50;

function strongestSkillController(session: GameSession): EncounterController {
  return {
    selectSkill(knownSkills) {
      const skills = knownSkills.map((name) => session.registry.get(name));
      const best = skills.reduce((top, skill) => (skill.power > top.power ? skill : top));
      return best.name;
    },
  };
}

function main(): void {
  dotenv.config();
  const config = loadConfig();
  const session = createSession(config);
  const controller = strongestSkillController(session);

  console.info(`Seed: ${config.seed ?? "(random)"}, enemy policy: ${config.enemyPolicy}`);
  console.info(`You start on layer ${session.layer} knowing: ${session.player.knownSkills().join(", ")}`);

  for (let i = 0; i < MAX_EXPLORATIONS && session.status === "exploring"; i++) {
    const report = explore(session, controller);
    if (report === "defeated") break;

    for (const fusion of session.availableFusions()) {
      if (!session.player.knows(fusion.a) || !session.player.knows(fusion.b)) continue;
      const outcome = session.fuse(fusion.a, fusion.b);
      if (outcome.status === "fused") {
        console.info(`Fused ${fusion.a} + ${fusion.b} into ${formatSkill(outcome.skill)}`);
      }
    }

    const climb = session.ascend();
    console.info(
      climb.escaped
        ? "You step out into the sunlight. The surface world sprawls before you."
        : `You climb to layer ${climb.layer} and regain ${climb.healed} HP.`
    );
  }

  console.info(`Final state: ${session.status}, HP ${session.player.health}/${session.player.maxHealth}`);
  console.info(`Known skills: ${session.player.knownSkills().join(", ")}`);
}

function explore(session: GameSession, controller: EncounterController): "won" | "defeated" {
  const report = session.explore(controller);
  const names = { player: session.player.name, enemy: report.enemy.name };

  console.info(`--- A wild ${report.enemy.name} appears (HP ${report.enemy.health}, knows ${report.enemy.skills.join(", ")}) ---`);
  for (const entry of report.encounter.log) {
    console.info(`  [round ${entry.round}] ${describeLogEntry(entry, names)}`);
  }
  console.info(describeOutcome(report.encounter.outcome, report.enemy.name));

  if (report.status === "defeated") {
    console.info("GAME OVER - your journey ends here.");
    return "defeated";
  }
  if (report.absorbed) console.info(`You devour the ${report.enemy.name} and learn ${report.absorbed}!`);
  if (report.evolved) console.info("[EVOLUTION] Your skin thickens and your vitality grows!");
  return "won";
}

try {
  main();
} catch (err) {
  console.error("Simulation failed", err);
  process.exitCode = 1;
}
