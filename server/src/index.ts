import { GameSession } from "@shared/combat/engine/game-session";
import { createSeededRng, mathRandomRng } from "@shared/combat/engine/rng";
import type { OdysseyConfig } from "./config";
import { buildGameContent, loadContentPackFromFile } from "./content/import";

export { loadConfig } from "./config";
export type { OdysseyConfig } from "./config";
export { describeLogEntry, describeOutcome } from "./narration";

/**
 * Build a fresh, isolated session from configuration.
 */
export function createSession(config: OdysseyConfig): GameSession {
  const pack = loadContentPackFromFile(config.contentPackPath);
  const content = buildGameContent(pack);
  const rng = config.seed ? createSeededRng(config.seed) : mathRandomRng;

  return new GameSession(content, rng, {
    enemyPolicy: config.enemyPolicy,
    evolutionChance: config.evolutionChance,
    consumeFusionComponents: config.consumeFusionComponents,
    player: { maxHealth: config.playerMaxHealth },
  });
}
