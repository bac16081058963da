/**
 * Odyssey Combat - Rule Errors
 *
 * content:   authoring bugs raised while populating registries, fatal at startup
 * input:     rejected player choices, core state untouched, caller re-prompts
 * invariant: broken data-model assumptions, fatal
 */

export type CombatErrorSeverity = "content" | "input" | "invariant";

export type CombatErrorCode =
  | "UNKNOWN_SKILL"
  | "DUPLICATE_SKILL"
  | "DUPLICATE_FUSION_PAIR"
  | "INVALID_CONTENT"
  | "UNKNOWN_OR_UNLEARNED_SKILL"
  | "INVALID_FUSION_REQUEST"
  | "UNLEARNED_SKILL"
  | "INVALID_ABSORPTION_CHOICE"
  | "NO_ENEMY_SKILLS"
  | "INVALID_ENCOUNTER"
  | "ENCOUNTER_OVER"
  | "ENCOUNTER_IN_PROGRESS"
  | "NO_PENDING_ABSORPTION"
  | "SESSION_OVER";

export const ERROR_SEVERITY: Record<CombatErrorCode, CombatErrorSeverity> = {
  UNKNOWN_SKILL: "content",
  DUPLICATE_SKILL: "content",
  DUPLICATE_FUSION_PAIR: "content",
  INVALID_CONTENT: "content",
  UNKNOWN_OR_UNLEARNED_SKILL: "input",
  INVALID_FUSION_REQUEST: "input",
  UNLEARNED_SKILL: "input",
  INVALID_ABSORPTION_CHOICE: "input",
  NO_ENEMY_SKILLS: "invariant",
  INVALID_ENCOUNTER: "invariant",
  ENCOUNTER_OVER: "invariant",
  ENCOUNTER_IN_PROGRESS: "input",
  NO_PENDING_ABSORPTION: "input",
  SESSION_OVER: "invariant",
};

export class CombatRuleError extends Error {
  code: CombatErrorCode;
  severity: CombatErrorSeverity;
  info?: unknown;

  constructor(code: CombatErrorCode, message: string, info?: unknown) {
    super(message);
    this.name = "CombatRuleError";
    this.code = code;
    this.severity = ERROR_SEVERITY[code];
    this.info = info;
  }
}

export function isCombatRuleError(error: unknown): error is CombatRuleError {
  return error instanceof CombatRuleError;
}

/**
 * True for rejected player input; the caller should ask again.
 */
export function isRecoverable(error: unknown): boolean {
  return isCombatRuleError(error) && error.severity === "input";
}
