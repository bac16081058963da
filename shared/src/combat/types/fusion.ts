/**
 * Odyssey Combat - Fusion Types
 */

import type { Skill } from "./skill";

export interface FusionRule {
  readonly a: string;
  readonly b: string;
  /** Name of the registered skill produced by the fusion */
  readonly result: string;
}

export type FusionLookup =
  | { found: true; skill: Skill }
  | { found: false; reason: "no_fusion_available" };

export type FusionOutcome =
  | {
      status: "fused";
      skill: Skill;
      /** Component skills removed from the fuser, empty unless consumed */
      consumed: string[];
    }
  | {
      status: "no_fusion_available";
      pair: [string, string];
    };

export interface AvailableFusion {
  a: string;
  b: string;
  result: Skill;
}

/**
 * Order-independent key for a pair of skill names.
 */
export function fusionPairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}
