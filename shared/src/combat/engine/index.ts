/**
 * Odyssey Combat - Engine Exports
 */

export { SkillRegistry } from "./skill-registry";
export { FusionTable } from "./fusion-table";
export { Combatant } from "./combatant";
export * from "./skill-effects";
export * from "./encounter";
export * from "./absorption";
export * from "./entity-factory";
export * from "./rng";
export * from "./game-session";
