// src/modules/tournament/tournament.repository.ts
import { and, desc, eq, gt, sql } from "drizzle-orm";
import type { GameDatabase } from "../../db";
import type { Tournament } from "./tournament.entity";
import { TournamentModel, TournamentStandingModel } from "./tournament.model";

export interface TournamentRepository {
  /** The tournament flagged active whose end lies after `now`, if any. */
  active(now: Date): Promise<Tournament | null>;
  addPlayerPoints(
    tournamentId: number,
    handle: string,
    points: number,
    isCorrect: boolean
  ): Promise<void>;
  incrementRoundsCompleted(tournamentId: number): Promise<void>;
}

export class DrizzleTournamentRepository implements TournamentRepository {
  constructor(private readonly db: GameDatabase) {}

  async active(now: Date): Promise<Tournament | null> {
    const rows = await this.db
      .select()
      .from(TournamentModel)
      .where(and(eq(TournamentModel.isActive, true), gt(TournamentModel.endsAt, now)))
      .orderBy(desc(TournamentModel.startedAt))
      .limit(1);
    if (rows.length === 0) return null;

    const row = rows[0];
    return {
      id: row.tournamentID,
      name: row.name,
      startedAt: row.startedAt,
      endsAt: row.endsAt,
      isActive: row.isActive,
      totalRounds: row.totalRounds,
      roundsCompleted: row.roundsCompleted,
    };
  }

  async addPlayerPoints(
    tournamentId: number,
    handle: string,
    points: number,
    isCorrect: boolean
  ): Promise<void> {
    const correct = isCorrect ? 1 : 0;
    await this.db
      .insert(TournamentStandingModel)
      .values({
        tournamentID: tournamentId,
        handle,
        points,
        correctCount: correct,
        totalCount: 1,
      })
      .onConflictDoUpdate({
        target: [TournamentStandingModel.tournamentID, TournamentStandingModel.handle],
        set: {
          points: sql`${TournamentStandingModel.points} + ${points}`,
          correctCount: sql`${TournamentStandingModel.correctCount} + ${correct}`,
          totalCount: sql`${TournamentStandingModel.totalCount} + 1`,
        },
      });
  }

  async incrementRoundsCompleted(tournamentId: number): Promise<void> {
    await this.db
      .update(TournamentModel)
      .set({ roundsCompleted: sql`${TournamentModel.roundsCompleted} + 1` })
      .where(eq(TournamentModel.tournamentID, tournamentId));
  }
}
