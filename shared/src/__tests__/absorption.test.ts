import { describe, expect, it, vi } from "vitest";
import { absorb, absorptionCandidates, fuse, listAvailableFusions } from "../combat/engine/absorption";
import { FusionTable } from "../combat/engine/fusion-table";
import { expectRuleError, makeEnemy, makePlayer, makeRegistry, makeSkill } from "../test-utils/factories";

function setupFusions() {
  const registry = makeRegistry([
    makeSkill("Thread Shot", { category: "Wind", power: 2 }),
    makeSkill("Acid Glob", { category: "Venom", power: 3 }),
    makeSkill("Fireball", { category: "Fire", power: 5 }),
    makeSkill("Wind Burst", { category: "Wind", power: 3 }),
    makeSkill("Acidic Web", { category: "Fusion", power: 6 }),
    makeSkill("Flaming Cyclone", { category: "Fusion", power: 9 }),
  ]);
  const table = new FusionTable(registry);
  table.register("Thread Shot", "Acid Glob", "Acidic Web");
  table.register("Fireball", "Wind Burst", "Flaming Cyclone");
  return { registry, table };
}

describe("absorb", () => {
  it("grants the enemy's earliest skill the player lacks", () => {
    const player = makePlayer(["Ember"]);
    const enemy = makeEnemy(["Ember", "Stone Shard", "Water Jet"]);

    expect(absorptionCandidates(enemy, player)).toEqual(["Stone Shard", "Water Jet"]);
    expect(absorb(enemy, player)).toBe("Stone Shard");
    expect(player.knownSkills()).toEqual(["Ember", "Stone Shard"]);
  });

  it("re-grants the enemy's first skill when nothing is new", () => {
    const player = makePlayer(["Water Jet", "Ember"]);
    const enemy = makeEnemy(["Ember"]);

    expect(absorb(enemy, player)).toBe("Ember");
    expect(player.knownSkills()).toEqual(["Water Jet", "Ember"]);
  });

  it("fails when the enemy has no skills", () => {
    const player = makePlayer(["Water Jet"]);
    expectRuleError(() => absorb(makeEnemy([]), player), "NO_ENEMY_SKILLS");
    expect(player.knownSkills()).toEqual(["Water Jet"]);
  });

  it("lets a chooser pick among the new skills", () => {
    const player = makePlayer(["Ember"]);
    const enemy = makeEnemy(["Ember", "Stone Shard", "Water Jet"]);
    const selectAbsorption = vi.fn(() => "Water Jet");

    expect(absorb(enemy, player, { selectAbsorption })).toBe("Water Jet");
    expect(selectAbsorption).toHaveBeenCalledWith(["Stone Shard", "Water Jet"]);
    expect(player.knownSkills()).toEqual(["Ember", "Water Jet"]);
  });

  it("rejects a choice outside the candidates", () => {
    const player = makePlayer(["Ember"]);
    const enemy = makeEnemy(["Ember", "Stone Shard"]);

    expectRuleError(
      () => absorb(enemy, player, { selectAbsorption: () => "Ember" }),
      "INVALID_ABSORPTION_CHOICE"
    );
    expect(player.knownSkills()).toEqual(["Ember"]);
  });

  it("does not ask the chooser when nothing is new", () => {
    const selectAbsorption = vi.fn(() => "Ember");
    absorb(makeEnemy(["Ember"]), makePlayer(["Ember"]), { selectAbsorption });
    expect(selectAbsorption).not.toHaveBeenCalled();
  });
});

describe("fuse", () => {
  it("creates the fused skill and learns it once", () => {
    const { table, registry } = setupFusions();
    const player = makePlayer(["Thread Shot", "Acid Glob"]);

    const outcome = fuse(player, "Thread Shot", "Acid Glob", table);

    expect(outcome).toEqual({ status: "fused", skill: registry.get("Acidic Web"), consumed: [] });
    expect(player.knownSkills()).toEqual(["Thread Shot", "Acid Glob", "Acidic Web"]);

    fuse(player, "Acid Glob", "Thread Shot", table);
    expect(player.knownSkills().filter((s) => s === "Acidic Web")).toHaveLength(1);
  });

  it("returns no_fusion_available and leaves the player alone", () => {
    const { table } = setupFusions();
    const player = makePlayer(["Thread Shot", "Fireball"]);

    const outcome = fuse(player, "Thread Shot", "Fireball", table);

    expect(outcome).toEqual({ status: "no_fusion_available", pair: ["Thread Shot", "Fireball"] });
    expect(player.knownSkills()).toEqual(["Thread Shot", "Fireball"]);
  });

  it("requires both skills to be known", () => {
    const { table } = setupFusions();
    const player = makePlayer(["Thread Shot"]);

    expectRuleError(() => fuse(player, "Thread Shot", "Acid Glob", table), "UNLEARNED_SKILL");
    expect(player.knownSkills()).toEqual(["Thread Shot"]);
  });

  it("rejects fusing a skill with itself", () => {
    const { table } = setupFusions();
    const player = makePlayer(["Thread Shot"]);
    expectRuleError(() => fuse(player, "Thread Shot", "Thread Shot", table), "INVALID_FUSION_REQUEST");
  });

  it("can consume the component skills", () => {
    const { table } = setupFusions();
    const player = makePlayer(["Fireball", "Thread Shot", "Wind Burst"]);

    const outcome = fuse(player, "Wind Burst", "Fireball", table, { consumeComponents: true });

    expect(outcome).toMatchObject({ status: "fused", consumed: ["Wind Burst", "Fireball"] });
    expect(player.knownSkills()).toEqual(["Thread Shot", "Flaming Cyclone"]);
  });
});

describe("listAvailableFusions", () => {
  it("lists every known pair with a rule", () => {
    const { table } = setupFusions();
    const player = makePlayer(["Fireball", "Acid Glob", "Wind Burst", "Thread Shot"]);

    const fusions = listAvailableFusions(player, table).map((f) => [f.a, f.b, f.result.name]);

    expect(fusions).toEqual([
      ["Fireball", "Wind Burst", "Flaming Cyclone"],
      ["Acid Glob", "Thread Shot", "Acidic Web"],
    ]);
  });

  it("is empty with fewer than two skills", () => {
    const { table } = setupFusions();
    expect(listAvailableFusions(makePlayer(["Fireball"]), table)).toEqual([]);
  });
});
