/**
 * Odyssey Combat - Main Export
 *
 * Skill acquisition, fusion and turn-based combat for Predator's Odyssey.
 */

// All types
export * from "./types";

// Registries, combatants, encounters, absorption, sessions
export * from "./engine";

// Request validation
export * from "./validation";

// Stat mutations
export * from "../rules/mutations";
