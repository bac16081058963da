/**
 * Odyssey Combat - Type Exports
 */

// Skills and effect variants
export * from "./skill";

// Fusion rules and lookup results
export * from "./fusion";

// Combatant stats and pending effects
export * from "./combatant";

// Encounter phases, log and controllers
export * from "./encounter";

// Rule errors
export * from "./errors";
