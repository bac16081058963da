// Content import pipeline. Reads a ContentPack from YAML/JSON, checks its
// shape, and registers it into a fresh skill registry and fusion table.
// Registration errors (duplicates, unknown fusion inputs) surface as
// CombatRuleErrors from the engine.

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import type { SkillEffect } from "@shared/combat/types/skill";
import { isSkillCategory } from "@shared/combat/types/skill";
import { CombatRuleError } from "@shared/combat/types/errors";
import { SkillRegistry } from "@shared/combat/engine/skill-registry";
import { FusionTable } from "@shared/combat/engine/fusion-table";
import type { GameContent } from "@shared/combat/engine/game-session";
import type { ContentFusion, ContentPack, ContentPackInfo, ContentSkill } from "./content-types";

export function loadContentPackFromFile(filePath: string): ContentPack {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".yaml" && ext !== ".yml" && ext !== ".json") {
    throw new Error(`Unsupported content file extension: ${ext}`);
  }
  const raw = fs.readFileSync(filePath, "utf8");
  const data: unknown = ext === ".json" ? JSON.parse(raw) : yaml.load(raw);
  return parseContentPack(data);
}

export function buildGameContent(pack: ContentPack): GameContent {
  assertSlowedHitsLand(pack.skills);

  const registry = new SkillRegistry();
  for (const skill of pack.skills) {
    registry.register({
      name: skill.name,
      category: skill.category,
      power: skill.power,
      effect: skill.effect ?? { kind: "none" },
      description: skill.description,
    });
  }
  registry.seal();

  const fusions = new FusionTable(registry);
  for (const rule of pack.fusions) {
    fusions.register(rule.a, rule.b, rule.result);
  }

  return { registry, fusions, enemyNames: [...pack.enemies.names] };
}

/**
 * A slowed attack with the pack's weakest damaging skill must still deal
 * at least 1 damage.
 */
export function assertSlowedHitsLand(skills: readonly ContentSkill[]): void {
  const powers = skills.map((s) => s.power).filter((p) => p > 0);
  if (powers.length === 0) return;
  const weakest = Math.min(...powers);

  for (const skill of skills) {
    const effect = skill.effect;
    if (effect?.kind === "slow" && Math.trunc(weakest * effect.powerFactor) < 1) {
      throw new CombatRuleError(
        "INVALID_CONTENT",
        `${skill.name} slows power-${weakest} skills to 0 damage (powerFactor ${effect.powerFactor})`,
        { skill: skill.name, weakest }
      );
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SHAPE CHECKS
// ═══════════════════════════════════════════════════════════════════════════

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseContentPack(data: unknown): ContentPack {
  if (!isObject(data)) {
    throw new Error("Content pack must be an object");
  }
  if (!isObject(data.pack) || typeof data.pack.key !== "string") {
    throw new Error("Content pack must include pack with key");
  }
  for (const key of ["skills", "fusions"]) {
    if (!Array.isArray(data[key])) {
      throw new Error(`Content pack must include array field: ${key}`);
    }
  }
  if (!isObject(data.enemies) || !Array.isArray(data.enemies.names)) {
    throw new Error("Content pack must include enemies.names");
  }

  return {
    pack: parsePackInfo(data.pack),
    skills: asArray(data.skills).map(parseSkill),
    fusions: asArray(data.fusions).map(parseFusion),
    enemies: { names: asArray(data.enemies.names).map((n, i) => requireString(n, `enemies.names[${i}]`)) },
  };
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function parsePackInfo(raw: RawObject): ContentPackInfo {
  return {
    key: requireString(raw.key, "pack.key"),
    name: requireString(raw.name ?? raw.key, "pack.name"),
    description: optionalString(raw.description, "pack.description"),
  };
}

function parseSkill(raw: unknown, index: number): ContentSkill {
  const where = `skills[${index}]`;
  if (!isObject(raw)) throw new Error(`${where} must be an object`);

  const name = requireString(raw.name, `${where}.name`);
  if (!isSkillCategory(raw.category)) {
    throw new Error(`${where} (${name}) has unknown category: ${String(raw.category)}`);
  }
  return {
    name,
    category: raw.category,
    power: requireNumber(raw.power, `${where}.power`),
    effect: raw.effect === undefined ? undefined : parseEffect(raw.effect, `${where}.effect`),
    description: optionalString(raw.description, `${where}.description`),
  };
}

function parseEffect(raw: unknown, where: string): SkillEffect {
  if (!isObject(raw)) throw new Error(`${where} must be an object`);
  switch (raw.kind) {
    case "none":
      return { kind: "none" };
    case "damage_over_time":
      return {
        kind: "damage_over_time",
        damagePerTurn: requireNumber(raw.damagePerTurn, `${where}.damagePerTurn`),
        turns: requireNumber(raw.turns, `${where}.turns`),
      };
    case "slow":
      return {
        kind: "slow",
        powerFactor: requireNumber(raw.powerFactor, `${where}.powerFactor`),
        turns: requireNumber(raw.turns, `${where}.turns`),
      };
    case "multi_target":
      return {
        kind: "multi_target",
        maxTargets: requireNumber(raw.maxTargets, `${where}.maxTargets`),
      };
    default:
      throw new Error(`${where} has unknown kind: ${String(raw.kind)}`);
  }
}

function parseFusion(raw: unknown, index: number): ContentFusion {
  const where = `fusions[${index}]`;
  if (!isObject(raw)) throw new Error(`${where} must be an object`);
  return {
    a: requireString(raw.a, `${where}.a`),
    b: requireString(raw.b, `${where}.b`),
    result: requireString(raw.result, `${where}.result`),
  };
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`${where} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return requireString(value, where);
}

function requireNumber(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where} must be a number`);
  }
  return value;
}
