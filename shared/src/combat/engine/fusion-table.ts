/**
 * Odyssey Combat - Fusion Table
 *
 * Maps unordered pairs of skill names to a fused skill.
 * lookup(a, b) and lookup(b, a) always agree.
 */

import type { FusionLookup, FusionRule } from "../types/fusion";
import { fusionPairKey } from "../types/fusion";
import { CombatRuleError } from "../types/errors";
import type { SkillRegistry } from "./skill-registry";

export class FusionTable {
  private readonly rulesByPair = new Map<string, FusionRule>();

  constructor(private readonly registry: SkillRegistry) {}

  register(a: string, b: string, result: string): FusionRule {
    for (const name of [a, b, result]) {
      // throws UNKNOWN_SKILL
      this.registry.get(name);
    }
    if (a === b) {
      throw new CombatRuleError("INVALID_CONTENT", `Fusion of "${a}" with itself is not allowed`, {
        a,
        b,
        result,
      });
    }

    const key = fusionPairKey(a, b);
    const existing = this.rulesByPair.get(key);
    if (existing) {
      throw new CombatRuleError(
        "DUPLICATE_FUSION_PAIR",
        `Fusion pair "${a}" + "${b}" already produces "${existing.result}"`,
        { a, b, result, existing: existing.result }
      );
    }

    const rule: FusionRule = Object.freeze({ a, b, result });
    this.rulesByPair.set(key, rule);
    return rule;
  }

  lookup(a: string, b: string): FusionLookup {
    const rule = this.rulesByPair.get(fusionPairKey(a, b));
    if (!rule) {
      return { found: false, reason: "no_fusion_available" };
    }
    return { found: true, skill: this.registry.get(rule.result) };
  }

  rules(): readonly FusionRule[] {
    return [...this.rulesByPair.values()];
  }

  get size(): number {
    return this.rulesByPair.size;
  }
}
