// Types for file-based content packs (YAML/JSON) that populate the skill
// registry and fusion table at startup. Optimized for authoring by hand.

import type { SkillCategory, SkillEffect } from "@shared/combat/types/skill";

export interface ContentPackInfo {
  key: string;
  name: string;
  description?: string;
}

export interface ContentSkill {
  name: string;
  category: SkillCategory;
  power: number;
  /** Omitted means no special effect */
  effect?: SkillEffect;
  description?: string;
}

export interface ContentFusion {
  a: string;
  b: string;
  result: string;
}

export interface ContentEnemies {
  names: string[];
}

export interface ContentPack {
  pack: ContentPackInfo;
  skills: ContentSkill[];
  fusions: ContentFusion[];
  enemies: ContentEnemies;
}
