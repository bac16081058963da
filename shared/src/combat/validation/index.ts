/**
 * Odyssey Combat - Validation Module Exports
 */

export {
  validateSkillChoice,
  validateFusionRequest,
  validateEncounterStart,
  assertValid,

  // Types
  type ValidationResult,
} from "./action-validator";
