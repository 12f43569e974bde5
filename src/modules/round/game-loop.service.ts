// src/modules/round/game-loop.service.ts
import { Inject, Injectable, OnApplicationShutdown } from "@nestjs/common";
import { GAME_CONFIG, GameConfig } from "../../config/game-config";
import { GAME_STORE, type GameStore } from "../../db/game-store";
import { RoundStage } from "../../enums";
import {
  describeError,
  ExhaustedSourceError,
  GameError,
  isRetryable,
  NoProviderConfiguredError,
  WaitCancelledError,
} from "../../errors";
import { attemptCleanup } from "../../errors/guards";
import { LoggingService } from "../../utils/logger";
import { IMAGE_PREPARER, type ImagePreparer } from "../media/image-preparer";
import {
  QUESTION_PROVIDERS,
  type QuestionProvider,
} from "../question/question-provider.interface";
import { assertProviders, RANDOM_SOURCE, type RandomSource } from "../question/question-selector";
import { RecoveryService } from "../recovery/recovery.service";
import { CLOCK, ROUND_WAITER, type Clock, type RoundWaiter } from "../scheduling/round-waiter";
import { SOCIAL_PUBLISHER, type SocialPublisher } from "../social/social-publisher.interface";
import { RoundStateMachine } from "./round-state-machine";
import { internalProblem, noQuestionAvailable } from "./round.posts";

export type RoundOutcome = "completed" | "skipped" | "failed" | "cancelled";

/**
 * Plays rounds back to back. A failed round is logged, announced, cleaned up
 * and followed by a cooldown; only a missing provider stops the loop.
 * A round interrupted by shutdown is left as stored for the next sweep.
 */
@Injectable()
export class GameLoopService implements OnApplicationShutdown {
  private running = false;
  private lastSequence = 0;
  private needsSweep = true;

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    @Inject(SOCIAL_PUBLISHER) private readonly publisher: SocialPublisher,
    @Inject(QUESTION_PROVIDERS) private readonly providers: QuestionProvider[],
    @Inject(IMAGE_PREPARER) private readonly imagePreparer: ImagePreparer,
    @Inject(ROUND_WAITER) private readonly waiter: RoundWaiter,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    @Inject(LoggingService) private readonly logger: LoggingService,
    @Inject(RecoveryService) private readonly recovery: RecoveryService
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Plays rounds until {@link stop} is called. */
  async start(): Promise<void> {
    assertProviders(this.providers);
    this.running = true;
    this.logger.logInfo("Game loop started", {
      sources: this.providers.map((provider) => provider.getSourceName()),
      threshold: this.config.threshold,
      manualAdvance: this.config.manualAdvance,
    });
    while (this.running) {
      await this.runRound();
    }
    this.logger.logInfo("Game loop stopped", { lastRound: this.lastSequence });
  }

  async runRound(): Promise<RoundOutcome> {
    if (this.needsSweep && !(await this.recover())) {
      return this.cooldown(this.config.failureCooldownMinutes, "retrying recovery", "failed");
    }

    this.lastSequence += 1;
    const round = this.createRound(this.lastSequence);
    try {
      await round.beginRound();
      await round.awaitCollectionWindow();
      if ((await round.scoreRound()) === "skipped") {
        return this.cooldown(
          this.config.skipCooldownMinutes,
          "cooldown after a skipped round",
          "skipped"
        );
      }
      await round.publishResults();
      await round.finalize();
    } catch (error) {
      if (round.context.roundId === undefined) {
        this.lastSequence = round.context.sequenceNumber - 1;
      }
      if (error instanceof WaitCancelledError) {
        this.abandon(round);
        return "cancelled";
      }
      await this.handleFailure(round, error);
      return this.cooldown(
        this.config.failureCooldownMinutes,
        "cooldown after a failed round",
        "failed"
      );
    }
    return this.cooldown(this.config.roundIntervalMinutes, "waiting for the next round", "completed");
  }

  stop(): void {
    this.running = false;
    this.waiter.cancel?.();
  }

  onApplicationShutdown(signal?: string): void {
    this.logger.logInfo("Shutting down the game loop", { signal: signal ?? null });
    this.stop();
  }

  private async cooldown(
    minutes: number,
    reason: string,
    outcome: RoundOutcome
  ): Promise<RoundOutcome> {
    try {
      await this.waiter.wait(minutes, reason);
    } catch (error) {
      if (error instanceof WaitCancelledError) return outcome;
      throw error;
    }
    return outcome;
  }

  private abandon(round: RoundStateMachine): void {
    if (round.hasUnsettledRow) this.needsSweep = true;
    this.logger.logWarn("Round abandoned on shutdown", {
      round: round.context.sequenceNumber,
      stage: round.stage,
      state: round.state,
    });
  }

  private createRound(sequenceNumber: number): RoundStateMachine {
    return new RoundStateMachine(
      sequenceNumber,
      {
        store: this.store,
        publisher: this.publisher,
        providers: this.providers,
        imagePreparer: this.imagePreparer,
        waiter: this.waiter,
        logger: this.logger,
        clock: this.clock,
        random: this.random,
      },
      {
        threshold: this.config.threshold,
        collectionWindowMinutes: this.config.collectionWindowMinutes,
        roundIntervalMinutes: this.config.roundIntervalMinutes,
        resultsPostBudget: this.config.resultsPostBudget,
        placementBonus: this.config.placementBonus,
      }
    );
  }

  /**
   * Sequence numbers continue from the highest one ever seen, read before the
   * sweep so a discarded round's number is not handed out again.
   */
  private async recover(): Promise<boolean> {
    try {
      const last = await this.store.rounds.lastRound();
      this.lastSequence = Math.max(this.lastSequence, last?.sequenceNumber ?? 0);
      await this.recovery.sweep();
      this.needsSweep = false;
      return true;
    } catch (error) {
      this.logger.logError("Recovery sweep failed", {
        stage: RoundStage.Recovery,
        error: describeError(error),
      });
      return false;
    }
  }

  private async handleFailure(round: RoundStateMachine, error: unknown): Promise<void> {
    if (error instanceof NoProviderConfiguredError) throw error;

    const meta = {
      round: round.context.sequenceNumber,
      stage: round.stage,
      state: round.state,
    };
    this.logger.logError(`Round failed: ${describeError(error)}`, {
      ...meta,
      kind: error instanceof GameError ? error.kind : "UNEXPECTED",
      retryable: isRetryable(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    const orphan = round.orphanedAnnouncement;
    if (orphan !== undefined) {
      await attemptCleanup(this.logger, "retract the orphaned announcement", meta, () =>
        this.publisher.retract(orphan)
      );
    }
    if (round.hasUnsettledRow) {
      this.needsSweep = true;
    }

    const notice = error instanceof ExhaustedSourceError ? noQuestionAvailable() : internalProblem();
    await attemptCleanup(this.logger, "publish the failure notice", meta, () =>
      this.publisher.publish(notice)
    );
  }
}
