import { describe, expect, it } from "vitest";
import { Combatant } from "../combat/engine/combatant";
import { EVOLUTION } from "../rules/mutations";
import { expectRuleError, makePlayer } from "../test-utils/factories";

describe("Combatant.takeDamage", () => {
  it("never drives health below zero", () => {
    for (const defense of [0, 3]) {
      for (const health of [0, 1, 5, 20]) {
        for (const damage of [0, 1, 4, 5, 19, 20, 21, 1000]) {
          const c = new Combatant({
            name: "Bat",
            role: "enemy",
            maxHealth: 20,
            health,
            stats: { defenseReduction: defense },
          });
          const removed = c.takeDamage(damage);
          const mitigated = Math.max(0, damage - defense);

          expect(c.health).toBe(Math.max(0, health - mitigated));
          expect(removed).toBe(health - c.health);
        }
      }
    }
  });

  it("returns the amount actually subtracted", () => {
    const c = makePlayer([], { health: 3 });
    expect(c.takeDamage(10)).toBe(3);
    expect(c.health).toBe(0);
    expect(c.isDefeated()).toBe(true);
  });

  it("applies flat defense reduction", () => {
    const c = makePlayer([], { stats: { defenseReduction: 2 } });
    expect(c.takeDamage(5)).toBe(3);
    expect(c.takeDamage(1)).toBe(0);
    expect(c.health).toBe(17);
    expect(c.isDefeated()).toBe(false);
  });
});

describe("Combatant skills", () => {
  it("learns in acquisition order", () => {
    const c = makePlayer(["Water Jet"]);
    c.learn("Ember");
    c.learn("Stone Shard");
    expect(c.knownSkills()).toEqual(["Water Jet", "Ember", "Stone Shard"]);
  });

  it("treats learning a known skill as a no-op", () => {
    const once = makePlayer(["Water Jet"]);
    once.learn("Ember");

    const twice = makePlayer(["Water Jet"]);
    twice.learn("Ember");
    twice.learn("Ember");

    expect(twice.knownSkills()).toEqual(once.knownSkills());
  });

  it("drops duplicate starting skills", () => {
    const c = makePlayer(["Ember", "Ember", "Water Jet"]);
    expect(c.knownSkills()).toEqual(["Ember", "Water Jet"]);
  });

  it("hands out a copy of the known skills", () => {
    const c = makePlayer(["Water Jet"]);
    const view = c.knownSkills();
    c.learn("Ember");
    expect(view).toEqual(["Water Jet"]);
  });

  it("forgets skills", () => {
    const c = makePlayer(["Water Jet", "Ember"]);
    expect(c.forget("Water Jet")).toBe(true);
    expect(c.forget("Water Jet")).toBe(false);
    expect(c.knownSkills()).toEqual(["Ember"]);
    expect(c.knows("Ember")).toBe(true);
  });
});

describe("Combatant health and mutations", () => {
  it("heals up to max health", () => {
    const c = makePlayer([], { health: 15 });
    expect(c.heal(3)).toBe(3);
    expect(c.heal(10)).toBe(2);
    expect(c.health).toBe(20);
  });

  it("evolves with more max health and a full heal", () => {
    const c = new Combatant({ name: "You", role: "player", maxHealth: 15, health: 4 });
    c.applyMutation(EVOLUTION);
    expect(c.maxHealth).toBe(20);
    expect(c.health).toBe(20);
  });

  it("applies stat modifiers, truncating integer stats", () => {
    const c = makePlayer([]);
    c.applyMutation({
      id: "hardened",
      name: "Hardened Carapace",
      modifiers: [
        { stat: "attackMultiplier", operation: "mul", value: 1.5 },
        { stat: "defenseReduction", operation: "add", value: 2.7 },
        { stat: "maxHealth", operation: "set", value: 12 },
      ],
    });

    expect(c.stats).toEqual({ attackMultiplier: 1.5, defenseReduction: 2 });
    expect(c.maxHealth).toBe(12);
    expect(c.health).toBe(12);
  });

  it.each([
    [{ defenseReduction: 0.5 }],
    [{ defenseReduction: -1 }],
    [{ attackMultiplier: -0.5 }],
    [{ attackMultiplier: Number.NaN }],
    [{ attackMultiplier: Number.POSITIVE_INFINITY }],
  ])("rejects invalid starting stats %o", (stats) => {
    expectRuleError(() => makePlayer([], { stats }), "INVALID_CONTENT");
  });

  it("keeps health integral under whole defense", () => {
    const c = makePlayer([], { stats: { defenseReduction: 1, attackMultiplier: 0 } });
    c.takeDamage(3.9);
    expect(c.health).toBe(18);
  });

  it("rejects a non-positive max health", () => {
    expectRuleError(
      () => new Combatant({ name: "Ghost", role: "enemy", maxHealth: 0 }),
      "INVALID_CONTENT"
    );
  });
});

describe("Combatant pending effects", () => {
  it("keeps one instance per kind and refreshes it", () => {
    const c = makePlayer([]);
    const first = c.addEffect({ kind: "damage_over_time", damagePerTurn: 1, remaining: 1, source: "Acid Glob" });
    const second = c.addEffect({ kind: "damage_over_time", damagePerTurn: 2, remaining: 3, source: "Fireball" });

    expect(first).toBe(false);
    expect(second).toBe(true);
    expect(c.activeEffects()).toEqual([
      { kind: "damage_over_time", damagePerTurn: 2, remaining: 3, source: "Fireball" },
    ]);
  });

  it("tracks different kinds independently", () => {
    const c = makePlayer([]);
    c.addEffect({ kind: "damage_over_time", damagePerTurn: 1, remaining: 2, source: "Acid Glob" });
    c.addEffect({ kind: "slow", powerFactor: 0.5, remaining: 1, source: "Thread Shot" });

    expect(c.getEffect("slow")?.powerFactor).toBe(0.5);
    c.removeEffect("slow");
    expect(c.getEffect("slow")).toBeUndefined();
    expect(c.activeEffects()).toHaveLength(1);
  });
});
