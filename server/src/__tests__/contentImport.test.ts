import { describe, expect, it } from "vitest";
import { isCombatRuleError } from "@shared/combat/types/errors";
import { Combatant } from "@shared/combat/engine/combatant";
import { runEncounter } from "@shared/combat/engine/encounter";
import { DEFAULT_CONTENT_PACK } from "../config";
import { buildGameContent, loadContentPackFromFile, parseContentPack } from "../content/import";

function minimalPack(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    pack: { key: "test-pack" },
    skills: [
      { name: "Water Jet", category: "Water", power: 5 },
      { name: "Ember", category: "Fire", power: 4 },
      { name: "Steam Blast", category: "Fusion", power: 9 },
    ],
    fusions: [{ a: "Water Jet", b: "Ember", result: "Steam Blast" }],
    enemies: { names: ["Slime"] },
    ...overrides,
  };
}

describe("core content pack", () => {
  it("loads every skill, fusion and enemy name", () => {
    const pack = loadContentPackFromFile(DEFAULT_CONTENT_PACK);
    const content = buildGameContent(pack);

    expect(pack.pack.key).toBe("odyssey-core-v1");
    expect(content.registry.size).toBe(12);
    expect(content.registry.basicSkills()).toHaveLength(9);
    expect(content.registry.isSealed()).toBe(true);
    expect(content.fusions.size).toBe(3);
    expect(content.enemyNames).toEqual(["Goblin", "Slime", "Spider", "Bat", "Kobold", "Imp"]);
  });

  it("wires the curated fusions", () => {
    const { fusions } = buildGameContent(loadContentPackFromFile(DEFAULT_CONTENT_PACK));

    expect(fusions.lookup("Acid Glob", "Thread Shot")).toMatchObject({
      found: true,
      skill: { name: "Acidic Web", category: "Fusion", power: 6 },
    });
    expect(fusions.lookup("Water Jet", "Electric Current")).toMatchObject({
      found: true,
      skill: { name: "Conductive Spray" },
    });
  });

  it("defaults missing effects to none", () => {
    const { registry } = buildGameContent(loadContentPackFromFile(DEFAULT_CONTENT_PACK));
    expect(registry.get("Water Jet").effect).toEqual({ kind: "none" });
    expect(registry.get("Thread Shot").effect).toEqual({ kind: "slow", powerFactor: 0.5, turns: 2 });
  });
});

describe("shipped slows", () => {
  it("lets two slowing combatants finish their fight", () => {
    const { registry } = buildGameContent(loadContentPackFromFile(DEFAULT_CONTENT_PACK));
    const player = new Combatant({ name: "You", role: "player", maxHealth: 15, skills: ["Shadow Sneak", "Water Jet"] });
    const enemy = new Combatant({ name: "Bat", role: "enemy", maxHealth: 5, skills: ["Shadow Sneak"] });

    const report = runEncounter(player, enemy, { selectSkill: () => "Shadow Sneak" }, registry);

    expect(report.outcome).toBe("player_victory");
    expect(report.rounds).toBe(4);
    expect(player.health).toBe(12);
  });
});

describe("parseContentPack", () => {
  it("accepts a minimal pack", () => {
    const pack = parseContentPack(minimalPack());
    expect(pack.pack).toEqual({ key: "test-pack", name: "test-pack", description: undefined });
    expect(pack.skills.map((s) => s.name)).toEqual(["Water Jet", "Ember", "Steam Blast"]);
  });

  it.each([
    ["a non-object", [], "Content pack must be an object"],
    ["a missing pack key", minimalPack({ pack: {} }), "Content pack must include pack with key"],
    ["missing fusions", minimalPack({ fusions: undefined }), "Content pack must include array field: fusions"],
    ["missing enemy names", minimalPack({ enemies: {} }), "Content pack must include enemies.names"],
    [
      "an unknown category",
      minimalPack({ skills: [{ name: "Frost", category: "Ice", power: 2 }] }),
      "skills[0] (Frost) has unknown category: Ice",
    ],
    [
      "an unknown effect kind",
      minimalPack({ skills: [{ name: "Frost", category: "Water", power: 2, effect: { kind: "freeze" } }] }),
      "skills[0].effect has unknown kind: freeze",
    ],
    [
      "a non-numeric power",
      minimalPack({ skills: [{ name: "Frost", category: "Water", power: "2" }] }),
      "skills[0].power must be a number",
    ],
    [
      "a blank fusion result",
      minimalPack({ fusions: [{ a: "Water Jet", b: "Ember", result: " " }] }),
      "fusions[0].result must be a non-empty string",
    ],
  ])("rejects %s", (_label, data, message) => {
    expect(() => parseContentPack(data)).toThrow(message);
  });
});

describe("buildGameContent", () => {
  it("surfaces duplicate fusion pairs as rule errors", () => {
    const pack = parseContentPack(
      minimalPack({
        fusions: [
          { a: "Water Jet", b: "Ember", result: "Steam Blast" },
          { a: "Ember", b: "Water Jet", result: "Steam Blast" },
        ],
      })
    );

    let caught: unknown;
    try {
      buildGameContent(pack);
    } catch (error) {
      caught = error;
    }
    expect(isCombatRuleError(caught) ? caught.code : caught).toBe("DUPLICATE_FUSION_PAIR");
  });
});

describe("slow effects at load", () => {
  it("rejects a slow that reduces the weakest skill to no damage", () => {
    const pack = parseContentPack(
      minimalPack({
        skills: [
          { name: "Water Jet", category: "Water", power: 5 },
          { name: "Ember", category: "Fire", power: 1 },
          { name: "Steam Blast", category: "Fusion", power: 9 },
          { name: "Thread Shot", category: "Wind", power: 2, effect: { kind: "slow", powerFactor: 0.5, turns: 2 } },
        ],
      })
    );

    let caught: unknown;
    try {
      buildGameContent(pack);
    } catch (error) {
      caught = error;
    }
    expect(isCombatRuleError(caught) ? caught.code : caught).toBe("INVALID_CONTENT");
    expect(isCombatRuleError(caught) ? caught.message : caught).toBe(
      "Thread Shot slows power-1 skills to 0 damage (powerFactor 0.5)"
    );
  });

  it("ignores zero-power skills when finding the weakest", () => {
    const pack = parseContentPack(
      minimalPack({
        skills: [
          { name: "Water Jet", category: "Water", power: 2, effect: { kind: "slow", powerFactor: 0.5, turns: 1 } },
          { name: "Ember", category: "Fire", power: 4 },
          { name: "Steam Blast", category: "Fusion", power: 9 },
          { name: "Harden", category: "Earth", power: 0 },
        ],
      })
    );
    expect(buildGameContent(pack).registry.size).toBe(4);
  });
});

describe("loadContentPackFromFile", () => {
  it("rejects unsupported extensions", () => {
    expect(() => loadContentPackFromFile("pack.txt")).toThrow("Unsupported content file extension: .txt");
  });
});
