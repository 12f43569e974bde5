// src/modules/round/round.repository.ts
import { desc, eq } from "drizzle-orm";
import type { GameDatabase } from "../../db";
import { RoundState } from "../../enums";
import type { CreateRoundInput, PostRefs, Round, RoundId } from "./round.entity";
import { RoundModel } from "./round.model";

export interface RoundRepository {
  create(input: CreateRoundInput): Promise<RoundId>;
  updateState(id: RoundId, state: RoundState): Promise<void>;
  updatePercent(id: RoundId, percent: number): Promise<void>;
  updateAttempts(id: RoundId, attempts: number): Promise<void>;
  updateEndedAt(id: RoundId, endedAt: Date): Promise<void>;
  updatePostRefs(id: RoundId, refs: Partial<PostRefs>): Promise<void>;
  delete(id: RoundId): Promise<void>;
  lastRound(): Promise<Round | null>;
}

type RoundRow = typeof RoundModel.$inferSelect;

export class DrizzleRoundRepository implements RoundRepository {
  constructor(private readonly db: GameDatabase) {}

  async create(input: CreateRoundInput): Promise<RoundId> {
    const [created] = await this.db
      .insert(RoundModel)
      .values({
        sequenceNumber: input.sequenceNumber,
        state: input.state,
        answer: input.answer,
        sourceName: input.sourceName,
        tournamentID: input.tournamentId ?? null,
        roundPostRef: input.roundPostId,
      })
      .returning({ id: RoundModel.roundID });
    return created.id;
  }

  async updateState(id: RoundId, state: RoundState): Promise<void> {
    await this.db.update(RoundModel).set({ state }).where(eq(RoundModel.roundID, id));
  }

  async updatePercent(id: RoundId, percent: number): Promise<void> {
    await this.db.update(RoundModel).set({ percent }).where(eq(RoundModel.roundID, id));
  }

  async updateAttempts(id: RoundId, attempts: number): Promise<void> {
    await this.db.update(RoundModel).set({ attempts }).where(eq(RoundModel.roundID, id));
  }

  async updateEndedAt(id: RoundId, endedAt: Date): Promise<void> {
    await this.db.update(RoundModel).set({ endedAt }).where(eq(RoundModel.roundID, id));
  }

  async updatePostRefs(id: RoundId, refs: Partial<PostRefs>): Promise<void> {
    const changes: Partial<typeof RoundModel.$inferInsert> = {};
    if (refs.roundPostId !== undefined) changes.roundPostRef = refs.roundPostId;
    if (refs.endPostId !== undefined) changes.endPostRef = refs.endPostId;
    if (refs.resultsPostId !== undefined) changes.resultsPostRef = refs.resultsPostId;
    if (Object.keys(changes).length === 0) return;
    await this.db.update(RoundModel).set(changes).where(eq(RoundModel.roundID, id));
  }

  async delete(id: RoundId): Promise<void> {
    await this.db.delete(RoundModel).where(eq(RoundModel.roundID, id));
  }

  async lastRound(): Promise<Round | null> {
    const rows = await this.db
      .select()
      .from(RoundModel)
      .orderBy(desc(RoundModel.sequenceNumber))
      .limit(1);
    return rows.length > 0 ? this.mapRound(rows[0]) : null;
  }

  private mapRound(row: RoundRow): Round {
    return {
      id: row.roundID,
      sequenceNumber: row.sequenceNumber,
      state: row.state,
      answer: row.answer,
      sourceName: row.sourceName,
      tournamentId: row.tournamentID,
      startedAt: row.startedAt,
      endedAt: row.endedAt,
      percent: row.percent,
      attempts: row.attempts,
      postRefs: {
        roundPostId: row.roundPostRef,
        endPostId: row.endPostRef ?? undefined,
        resultsPostId: row.resultsPostRef ?? undefined,
      },
    };
  }
}
