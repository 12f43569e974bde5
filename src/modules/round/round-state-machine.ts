// src/modules/round/round-state-machine.ts
import { isTerminalState, RoundStage, RoundState } from "../../enums";
import { guardPersistence, guardPublish, attemptCleanup } from "../../errors/guards";
import type { GameStore } from "../../db/game-store";
import type { LoggingService, LogMeta } from "../../utils/logger";
import {
  type BonusTable,
  computeTournamentDelta,
  rank,
  type RankedResponse,
  successRate,
} from "../leaderboard/ranking";
import { isCorrectScore } from "../matcher/answer-matcher";
import type { ImagePreparer } from "../media/image-preparer";
import type { MediaItem, Question } from "../question/question.entity";
import type { QuestionProvider } from "../question/question-provider.interface";
import { drawQuestion, type RandomSource } from "../question/question-selector";
import type { RoundResponse } from "../response/response.entity";
import type { Clock, RoundWaiter } from "../scheduling/round-waiter";
import type { SocialPublisher, ThreadReply } from "../social/social-publisher.interface";
import type { Tournament } from "../tournament/tournament.entity";
import { parseThreadReply } from "../../dto/thread-reply.dto";
import type { PostRefs, RoundId } from "./round.entity";
import {
  insufficientParticipation,
  roundAnnouncement,
  roundResults,
  timeIsUp,
  TIPS,
} from "./round.posts";

export interface RoundDependencies {
  store: GameStore;
  publisher: SocialPublisher;
  providers: readonly QuestionProvider[];
  imagePreparer: ImagePreparer;
  waiter: RoundWaiter;
  logger: LoggingService;
  clock: Clock;
  random: RandomSource;
}

export interface RoundSettings {
  threshold: number;
  collectionWindowMinutes: number;
  roundIntervalMinutes: number;
  resultsPostBudget: number;
  placementBonus: BonusTable;
}

/** Everything one round has learned so far. */
export interface RoundContext {
  sequenceNumber: number;
  state: RoundState;
  stage: RoundStage;
  provider?: QuestionProvider;
  question?: Question;
  tournament: Tournament | null;
  roundId?: RoundId;
  startedAt?: Date;
  postRefs: Partial<PostRefs>;
  responses: RoundResponse[];
  ranked: RankedResponse[];
  tournamentDelta: Map<string, number>;
  percent?: number;
}

export type ScoreOutcome = "scored" | "skipped";

const PODIUM_SIZE = 3;

/**
 * Drives a single round from announcement to settlement:
 * INITIAL -> COLLECTING -> SCORING -> RESULTS, or SCORING -> SKIPPED when
 * nobody replied. Each stage method checks it is called from the state it
 * expects and throws otherwise.
 */
export class RoundStateMachine {
  private readonly ctx: RoundContext;

  constructor(
    sequenceNumber: number,
    private readonly deps: RoundDependencies,
    private readonly settings: RoundSettings
  ) {
    this.ctx = {
      sequenceNumber,
      state: RoundState.Initial,
      stage: RoundStage.Begin,
      tournament: null,
      postRefs: {},
      responses: [],
      ranked: [],
      tournamentDelta: new Map(),
    };
  }

  get context(): Readonly<RoundContext> {
    return this.ctx;
  }

  get state(): RoundState {
    return this.ctx.state;
  }

  get stage(): RoundStage {
    return this.ctx.stage;
  }

  /** True once a round row exists that has not reached a terminal state. */
  get hasUnsettledRow(): boolean {
    return this.ctx.roundId !== undefined && !isTerminalState(this.ctx.state);
  }

  /** The announcement, when it is still live but never got a row. */
  get orphanedAnnouncement(): string | undefined {
    return this.ctx.roundId === undefined ? this.ctx.postRefs.roundPostId : undefined;
  }

  async beginRound(): Promise<void> {
    this.enter(RoundStage.Begin, "begin", RoundState.Initial);
    if (this.ctx.roundId !== undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has already begun`);
    }

    const { provider, question } = await drawQuestion(
      this.deps.providers,
      this.deps.random,
      (error) => this.deps.logger.logWarn(error.message, this.meta())
    );
    this.ctx.provider = provider;
    this.ctx.question = question;

    const media = await this.prepareMedia(provider, question.media);
    const now = this.deps.clock();
    this.ctx.startedAt = now;
    this.ctx.tournament = await guardPersistence("look up the active tournament", () =>
      this.deps.store.tournaments.active(now)
    );

    const text = roundAnnouncement({
      sequenceNumber: this.ctx.sequenceNumber,
      sourceName: provider.getSourceName(),
      questionText: question.text,
      windowMinutes: this.settings.collectionWindowMinutes,
      now,
      tip: this.pickTip(),
      tournamentName: this.ctx.tournament?.name,
    });
    const roundPostId = await guardPublish("publish the round announcement", () =>
      this.deps.publisher.publish(text, media)
    );
    this.ctx.postRefs.roundPostId = roundPostId;

    const tournamentId = this.ctx.tournament?.id ?? null;
    try {
      this.ctx.roundId = await guardPersistence("store the new round", () =>
        this.deps.store.transaction(async (repos) => {
          const id = await repos.rounds.create({
            sequenceNumber: this.ctx.sequenceNumber,
            state: RoundState.Initial,
            answer: question.answer,
            roundPostId,
            sourceName: provider.getSourceName(),
            tournamentId,
          });
          await repos.rounds.updateState(id, RoundState.Collecting);
          return id;
        })
      );
    } catch (error) {
      const retracted = await attemptCleanup(
        this.deps.logger,
        "retract the unsaved announcement",
        this.meta(),
        () => this.deps.publisher.retract(roundPostId)
      );
      if (retracted) this.ctx.postRefs.roundPostId = undefined;
      throw error;
    }
    this.ctx.state = RoundState.Collecting;

    this.deps.logger.logInfo("Round started", {
      ...this.meta(),
      source: provider.getSourceName(),
      answer: question.answer,
      tournament: this.ctx.tournament?.name ?? null,
    });
  }

  async awaitCollectionWindow(): Promise<void> {
    this.enter(RoundStage.Collect, "collect replies", RoundState.Collecting);
    await this.deps.waiter.wait(
      this.settings.collectionWindowMinutes,
      `collecting replies for round #${this.ctx.sequenceNumber}`
    );
  }

  /**
   * Closes the window, reads every reply and scores it in memory. Nothing
   * about the responses is stored here; that happens in {@link finalize}.
   */
  async scoreRound(): Promise<ScoreOutcome> {
    this.enter(RoundStage.Score, "score", RoundState.Collecting);
    const roundId = this.requireRoundId();
    const roundPostId = this.requireRoundPost();
    const { provider, question } = this.requireQuestion();

    const endPostId = await guardPublish("publish the time's up notice", () =>
      this.deps.publisher.publish(timeIsUp(this.ctx.sequenceNumber))
    );
    this.ctx.postRefs.endPostId = endPostId;
    try {
      await guardPersistence("mark the round as scoring", () =>
        this.deps.store.transaction(async (repos) => {
          await repos.rounds.updateState(roundId, RoundState.Scoring);
          await repos.rounds.updatePostRefs(roundId, { endPostId });
        })
      );
    } catch (error) {
      // The sweep only knows about posts recorded on the row.
      await this.retractTimeIsUp();
      throw error;
    }
    this.ctx.state = RoundState.Scoring;

    const replies = await this.collectReplies(roundPostId);
    if (replies.length === 0) {
      await this.skip(roundId, roundPostId);
      return "skipped";
    }

    const now = this.deps.clock();
    this.ctx.responses = replies.map((reply, index) => {
      const score = clampScore(
        provider.evaluateAnswer(reply.text, question.answer, this.settings.threshold)
      );
      return {
        roundId,
        respondentHandle: reply.authorHandle,
        rawText: reply.text,
        score,
        isCorrect: isCorrectScore(score, this.settings.threshold),
        position: index + 1,
        recordedAt: now,
      };
    });

    for (const [index, response] of this.ctx.responses.entries()) {
      if (!response.isCorrect) continue;
      await attemptCleanup(
        this.deps.logger,
        "like a correct reply",
        { ...this.meta(), handle: response.respondentHandle },
        () => this.deps.publisher.like(replies[index].postRef)
      );
    }

    this.ctx.ranked = rank(this.ctx.responses, this.settings.placementBonus);
    this.ctx.tournamentDelta = this.ctx.tournament
      ? computeTournamentDelta(this.ctx.ranked, this.settings.placementBonus)
      : new Map();
    this.ctx.percent = successRate(this.ctx.ranked.length, this.ctx.responses.length);

    this.deps.logger.logInfo("Round scored", {
      ...this.meta(),
      attempts: this.ctx.responses.length,
      correct: this.ctx.ranked.length,
      percent: this.ctx.percent,
    });
    return "scored";
  }

  async publishResults(): Promise<void> {
    this.enter(RoundStage.Publish, "publish results", RoundState.Scoring);
    const { provider, question } = this.requireQuestion();
    const percent = this.ctx.percent;
    if (percent === undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has not been scored`);
    }

    const text = roundResults(
      {
        sequenceNumber: this.ctx.sequenceNumber,
        percent,
        answer: question.answer,
        answerLabel: provider.answerLabel,
        attempts: this.ctx.responses.length,
        topHandles: this.podium(),
        tournamentName: this.ctx.tournament?.name,
        nextRoundMinutes: this.settings.roundIntervalMinutes,
        now: this.deps.clock(),
      },
      this.settings.resultsPostBudget
    );
    this.ctx.postRefs.resultsPostId = await guardPublish("publish the round results", () =>
      this.deps.publisher.publish(text)
    );
  }

  /**
   * Commits the round in one transaction: responses, player aggregates,
   * tournament standings and the RESULTS transition. A failure leaves the
   * store as it was before the call.
   */
  async finalize(): Promise<void> {
    this.enter(RoundStage.Finalize, "finalize", RoundState.Scoring);
    const roundId = this.requireRoundId();
    const resultsPostId = this.ctx.postRefs.resultsPostId;
    const percent = this.ctx.percent;
    if (resultsPostId === undefined || percent === undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has no published results`);
    }

    const now = this.deps.clock();
    const tournament = this.ctx.tournament;
    await guardPersistence(`commit round #${this.ctx.sequenceNumber}`, () =>
      this.deps.store.transaction(async (repos) => {
        for (const response of this.ctx.responses) {
          await repos.responses.create(response);
          await repos.players.upsertOnCorrectness(
            response.respondentHandle,
            response.isCorrect,
            now
          );
        }

        if (tournament) {
          const pending = new Map(this.ctx.tournamentDelta);
          for (const response of this.ctx.responses) {
            const handle = response.respondentHandle;
            const points = pending.get(handle) ?? 0;
            pending.delete(handle);
            await repos.tournaments.addPlayerPoints(
              tournament.id,
              handle,
              points,
              response.isCorrect
            );
          }
          await repos.tournaments.incrementRoundsCompleted(tournament.id);
        }

        await repos.rounds.updatePercent(roundId, percent);
        await repos.rounds.updateAttempts(roundId, this.ctx.responses.length);
        await repos.rounds.updatePostRefs(roundId, { resultsPostId });
        await repos.rounds.updateEndedAt(roundId, now);
        await repos.rounds.updateState(roundId, RoundState.Results);
      })
    );
    this.ctx.state = RoundState.Results;

    await this.retractTimeIsUp();
    await this.verifyPodium(roundId);
    this.deps.logger.logInfo("Round finalized", { ...this.meta(), percent });
  }

  private async skip(roundId: RoundId, roundPostId: string): Promise<void> {
    const noticeId = await guardPublish("publish the no participation notice", () =>
      this.deps.publisher.publishReply(
        insufficientParticipation(this.ctx.sequenceNumber),
        roundPostId
      )
    );
    await this.retractTimeIsUp();

    const now = this.deps.clock();
    await guardPersistence(`skip round #${this.ctx.sequenceNumber}`, () =>
      this.deps.store.transaction(async (repos) => {
        await repos.rounds.updateAttempts(roundId, 0);
        await repos.rounds.updatePostRefs(roundId, { resultsPostId: noticeId });
        await repos.rounds.updateEndedAt(roundId, now);
        await repos.rounds.updateState(roundId, RoundState.Skipped);
      })
    );
    this.ctx.state = RoundState.Skipped;
    this.ctx.postRefs.resultsPostId = noticeId;
    this.deps.logger.logInfo("Round skipped: no replies", this.meta());
  }

  private async collectReplies(roundPostId: string): Promise<ThreadReply[]> {
    const raw = await guardPublish("fetch the round replies", () =>
      this.deps.publisher.fetchThreadReplies(roundPostId)
    );

    const replies: ThreadReply[] = [];
    for (const item of raw) {
      const parsed = parseThreadReply(item);
      if (!parsed.ok) {
        this.deps.logger.logWarn("Ignoring malformed reply", {
          ...this.meta(),
          problems: parsed.problems,
        });
        continue;
      }
      if (parsed.reply.authorHandle === this.deps.publisher.handle) continue;
      replies.push(parsed.reply);
    }
    return replies;
  }

  private async prepareMedia(
    provider: QuestionProvider,
    media: readonly MediaItem[]
  ): Promise<MediaItem[]> {
    const selected = media.slice(0, provider.maxMediaItems);
    if (!provider.requiresImageProcessing) return selected;

    const prepared: MediaItem[] = [];
    for (const item of selected) {
      prepared.push({ ...item, bytes: await this.deps.imagePreparer.prepare(item.bytes) });
    }
    return prepared;
  }

  private async retractTimeIsUp(): Promise<void> {
    const endPostId = this.ctx.postRefs.endPostId;
    if (endPostId === undefined) return;
    await attemptCleanup(this.deps.logger, "retract the time's up notice", this.meta(), () =>
      this.deps.publisher.retract(endPostId)
    );
  }

  private async verifyPodium(roundId: RoundId): Promise<void> {
    const expected = this.podium();
    await attemptCleanup(this.deps.logger, "verify the stored podium", this.meta(), async () => {
      const stored = await this.deps.store.responses.topCorrectByRound(roundId, PODIUM_SIZE);
      const handles = stored.map((response) => response.respondentHandle);
      if (handles.join("\n") !== expected.join("\n")) {
        this.deps.logger.logWarn("Stored podium differs from the published one", {
          ...this.meta(),
          published: expected,
          stored: handles,
        });
      }
    });
  }

  private podium(): string[] {
    return this.ctx.ranked
      .slice(0, PODIUM_SIZE)
      .map((ranked) => ranked.response.respondentHandle);
  }

  private pickTip(): string {
    const index = Math.min(Math.floor(this.deps.random() * TIPS.length), TIPS.length - 1);
    return TIPS[index];
  }

  private enter(stage: RoundStage, action: string, expected: RoundState): void {
    if (this.ctx.state !== expected) {
      throw new Error(
        `Round #${this.ctx.sequenceNumber} cannot ${action} while ${this.ctx.state}`
      );
    }
    this.ctx.stage = stage;
  }

  private requireRoundId(): RoundId {
    if (this.ctx.roundId === undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has no stored row`);
    }
    return this.ctx.roundId;
  }

  private requireRoundPost(): string {
    if (this.ctx.postRefs.roundPostId === undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has no announcement`);
    }
    return this.ctx.postRefs.roundPostId;
  }

  private requireQuestion(): { provider: QuestionProvider; question: Question } {
    const { provider, question } = this.ctx;
    if (provider === undefined || question === undefined) {
      throw new Error(`Round #${this.ctx.sequenceNumber} has no question`);
    }
    return { provider, question };
  }

  private meta(): LogMeta {
    return { round: this.ctx.sequenceNumber, stage: this.ctx.stage };
  }
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(100, Math.max(0, Math.round(score)));
}
