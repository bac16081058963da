/**
 * Odyssey Combat - Game Session
 *
 * Owns everything one playthrough needs: skill registry, fusion table,
 * the persistent player, the random source and dungeon progress.
 * Sessions share nothing, so several can run side by side.
 *
 * An exploration moves through two stages that survive rejected input:
 * the fight itself, then absorbing a skill from the defeated enemy.
 * Calling explore() again resumes whichever stage is pending.
 */

import type { CombatantSnapshot } from "../types/combatant";
import type {
  AbsorptionController,
  EncounterController,
  EncounterReport,
  EnemySkillPolicy,
  FusionController,
} from "../types/encounter";
import type { AvailableFusion, FusionOutcome } from "../types/fusion";
import { CombatRuleError } from "../types/errors";
import { EVOLUTION } from "../../rules/mutations";
import type { Combatant } from "./combatant";
import { DEFAULT_ENEMY_POLICY, Encounter, playUntilOver } from "./encounter";
import { absorb, absorptionCandidates, fuse, listAvailableFusions } from "./absorption";
import type { PlayerCreationOptions } from "./entity-factory";
import { createEnemy, createPlayer } from "./entity-factory";
import type { FusionTable } from "./fusion-table";
import type { SkillRegistry } from "./skill-registry";
import type { Rng } from "./rng";

export const BOTTOM_LAYER = -10;
export const TOP_LAYER = -1;
export const ASCEND_HEAL = 3;
export const DEFAULT_EVOLUTION_CHANCE = 0.2;

export type SessionStatus = "exploring" | "defeated" | "escaped";

/** Where the current exploration stands */
export type ExploreStage = "idle" | "fighting" | "absorbing";

type PendingExplore =
  | { stage: "fighting"; enemy: Combatant; enemyAtStart: CombatantSnapshot; encounter: Encounter }
  | { stage: "absorbing"; enemy: Combatant; enemyAtStart: CombatantSnapshot; encounter: EncounterReport };

export interface GameContent {
  registry: SkillRegistry;
  fusions: FusionTable;
  enemyNames: readonly string[];
}

export interface GameSessionOptions {
  enemyPolicy?: EnemySkillPolicy;
  /** Probability of evolving after a won fight, 0..1 */
  evolutionChance?: number;
  /** Remove the two inputs of a fusion */
  consumeFusionComponents?: boolean;
  player?: PlayerCreationOptions;
  startingLayer?: number;
}

export type ExploreController = EncounterController & Partial<AbsorptionController>;

export interface ExploreReport {
  enemy: CombatantSnapshot;
  encounter: EncounterReport;
  /** Skill granted on victory */
  absorbed: string | null;
  evolved: boolean;
  status: SessionStatus;
}

export interface AscendReport {
  layer: number;
  healed: number;
  escaped: boolean;
}

export class GameSession {
  readonly registry: SkillRegistry;
  readonly fusions: FusionTable;
  readonly player: Combatant;
  private readonly enemyNames: readonly string[];
  private readonly rng: Rng;
  private readonly enemyPolicy: EnemySkillPolicy;
  private readonly evolutionChance: number;
  private readonly consumeFusionComponents: boolean;
  private currentLayer: number;
  private currentStatus: SessionStatus = "exploring";
  private pending: PendingExplore | null = null;

  constructor(content: GameContent, rng: Rng, options: GameSessionOptions = {}) {
    this.registry = content.registry;
    this.fusions = content.fusions;
    this.enemyNames = content.enemyNames;
    this.rng = rng;
    this.enemyPolicy = options.enemyPolicy ?? DEFAULT_ENEMY_POLICY;
    this.evolutionChance = options.evolutionChance ?? DEFAULT_EVOLUTION_CHANCE;
    this.consumeFusionComponents = options.consumeFusionComponents ?? false;
    this.currentLayer = options.startingLayer ?? BOTTOM_LAYER;
    this.player = createPlayer(this.registry, rng, options.player);
  }

  get layer(): number {
    return this.currentLayer;
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get stage(): ExploreStage {
    return this.pending?.stage ?? "idle";
  }

  // ═════════════════════════════════════════════════════════════════════════
  // EXPLORE (fight a random enemy)
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Fight a fresh enemy, or resume the pending fight or absorption.
   * Rejected input leaves the stage in place for another attempt.
   */
  explore(controller: ExploreController): ExploreReport {
    this.ensureActive();
    let pending = this.pending ?? this.startFight();

    if (pending.stage === "fighting") {
      const encounter = playUntilOver(pending.encounter, controller);
      if (encounter.outcome === "player_defeat") {
        this.pending = null;
        this.currentStatus = "defeated";
        return { enemy: pending.enemyAtStart, encounter, absorbed: null, evolved: false, status: this.currentStatus };
      }
      pending = { stage: "absorbing", enemy: pending.enemy, enemyAtStart: pending.enemyAtStart, encounter };
      this.pending = pending;
    }

    const selectAbsorption = controller.selectAbsorption?.bind(controller);
    return this.finishAbsorption(pending, selectAbsorption ? { selectAbsorption } : undefined);
  }

  /**
   * Skills the defeated enemy can still give; empty outside the absorbing stage.
   */
  absorptionCandidates(): string[] {
    const pending = this.pending;
    if (!pending || pending.stage !== "absorbing") return [];
    return absorptionCandidates(pending.enemy, this.player);
  }

  /**
   * Complete a pending absorption, optionally naming the skill to take.
   */
  absorb(choice?: string): ExploreReport {
    this.ensureActive();
    const pending = this.pending;
    if (!pending || pending.stage !== "absorbing") {
      throw new CombatRuleError("NO_PENDING_ABSORPTION", "No defeated enemy is waiting to be absorbed", {
        stage: this.stage,
      });
    }
    return this.finishAbsorption(pending, choice === undefined ? undefined : { selectAbsorption: () => choice });
  }

  private startFight(): PendingExplore {
    const enemy = createEnemy(this.registry, this.rng, {
      layer: this.currentLayer,
      names: this.enemyNames,
    });
    const encounter = new Encounter(this.player, enemy, this.registry, { enemyPolicy: this.enemyPolicy });
    this.pending = { stage: "fighting", enemy, enemyAtStart: enemy.snapshot(), encounter };
    return this.pending;
  }

  private finishAbsorption(
    pending: Extract<PendingExplore, { stage: "absorbing" }>,
    chooser: AbsorptionController | undefined
  ): ExploreReport {
    const absorbed = absorb(pending.enemy, this.player, chooser);
    this.pending = null;

    const evolved = this.rng.next() < this.evolutionChance;
    if (evolved) {
      this.player.applyMutation(EVOLUTION);
    }

    return { enemy: pending.enemyAtStart, encounter: pending.encounter, absorbed, evolved, status: this.currentStatus };
  }

  // ═════════════════════════════════════════════════════════════════════════
  // FUSION
  // ═════════════════════════════════════════════════════════════════════════

  fuse(a: string, b: string): FusionOutcome {
    this.ensureIdle();
    return fuse(this.player, a, b, this.fusions, {
      consumeComponents: this.consumeFusionComponents,
    });
  }

  /**
   * Ask the controller for a pair; null when it cancels.
   */
  chooseFusion(controller: FusionController): FusionOutcome | null {
    this.ensureIdle();
    const pair = controller.selectFusionPair(this.player.knownSkills());
    if (!pair) return null;
    return this.fuse(pair[0], pair[1]);
  }

  availableFusions(): AvailableFusion[] {
    return listAvailableFusions(this.player, this.fusions);
  }

  // ═════════════════════════════════════════════════════════════════════════
  // ASCEND
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Climb one layer and recover a little. Climbing from the top layer
   * reaches the surface and ends the session.
   */
  ascend(): AscendReport {
    this.ensureIdle();
    if (this.currentLayer >= TOP_LAYER) {
      this.currentStatus = "escaped";
      return { layer: this.currentLayer, healed: 0, escaped: true };
    }
    this.currentLayer += 1;
    const healed = this.player.heal(ASCEND_HEAL);
    return { layer: this.currentLayer, healed, escaped: false };
  }

  private ensureIdle(): void {
    this.ensureActive();
    if (this.pending) {
      throw new CombatRuleError(
        "ENCOUNTER_IN_PROGRESS",
        `Finish the current exploration first (${this.pending.stage})`,
        { stage: this.pending.stage }
      );
    }
  }

  private ensureActive(): void {
    if (this.currentStatus !== "exploring") {
      throw new CombatRuleError("SESSION_OVER", `The session has ended (${this.currentStatus})`);
    }
  }
}
