// Runtime configuration, read from the environment (.env via dotenv at the
// entry points). Every setting has a default; malformed values are rejected.

import path from "path";
import { fileURLToPath } from "url";
import type { EnemySkillPolicy } from "@shared/combat/types/encounter";
import { ENEMY_SKILL_POLICIES, isEnemySkillPolicy } from "@shared/combat/types/encounter";
import { DEFAULT_EVOLUTION_CHANCE } from "@shared/combat/engine/game-session";
import { DEFAULT_PLAYER_MAX_HEALTH } from "@shared/combat/engine/entity-factory";

export const DEFAULT_CONTENT_PACK = fileURLToPath(new URL("../content/core-pack.yaml", import.meta.url));

export interface OdysseyConfig {
  contentPackPath: string;
  /** null means unseeded (Math.random) */
  seed: string | null;
  enemyPolicy: EnemySkillPolicy;
  evolutionChance: number;
  playerMaxHealth: number;
  consumeFusionComponents: boolean;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): OdysseyConfig {
  const contentPack = env.ODYSSEY_CONTENT_PACK?.trim();
  return {
    contentPackPath: contentPack ? path.resolve(contentPack) : DEFAULT_CONTENT_PACK,
    seed: env.ODYSSEY_SEED?.trim() || null,
    enemyPolicy: parsePolicy(env.ODYSSEY_ENEMY_POLICY),
    evolutionChance: parseChance(env.ODYSSEY_EVOLUTION_CHANCE),
    playerMaxHealth: parsePositiveInt(env.ODYSSEY_PLAYER_MAX_HEALTH, "ODYSSEY_PLAYER_MAX_HEALTH", DEFAULT_PLAYER_MAX_HEALTH),
    consumeFusionComponents: parseFlag(env.ODYSSEY_CONSUME_FUSION_COMPONENTS, "ODYSSEY_CONSUME_FUSION_COMPONENTS"),
  };
}

function parsePolicy(raw: string | undefined): EnemySkillPolicy {
  const value = raw?.trim();
  if (!value) return "first_known";
  if (!isEnemySkillPolicy(value)) {
    throw new Error(`ODYSSEY_ENEMY_POLICY must be one of ${ENEMY_SKILL_POLICIES.join(", ")} (got "${value}")`);
  }
  return value;
}

function parseChance(raw: string | undefined): number {
  const value = raw?.trim();
  if (!value) return DEFAULT_EVOLUTION_CHANCE;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) {
    throw new Error(`ODYSSEY_EVOLUTION_CHANCE must be a number between 0 and 1 (got "${value}")`);
  }
  return n;
}

function parsePositiveInt(raw: string | undefined, name: string, fallback: number): number {
  const value = raw?.trim();
  if (!value) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer (got "${value}")`);
  }
  return n;
}

function parseFlag(raw: string | undefined, name: string): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) return false;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new Error(`${name} must be true or false (got "${value}")`);
}
