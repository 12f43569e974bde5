// src/modules/player/player.repository.ts
import { eq } from "drizzle-orm";
import type { GameDatabase } from "../../db";
import { updatePlayerAggregate } from "../leaderboard/ranking";
import { newPlayer, Player } from "./player.entity";
import { PlayerModel } from "./player.model";

export interface PlayerRepository {
  /** Creates the player on first sight, then counts one more answer. */
  upsertOnCorrectness(handle: string, isCorrect: boolean, seenAt: Date): Promise<Player>;
  findByHandle(handle: string): Promise<Player | null>;
}

export class DrizzlePlayerRepository implements PlayerRepository {
  constructor(private readonly db: GameDatabase) {}

  async upsertOnCorrectness(
    handle: string,
    isCorrect: boolean,
    seenAt: Date
  ): Promise<Player> {
    const current = (await this.findByHandle(handle)) ?? newPlayer(handle, seenAt);
    const next = updatePlayerAggregate(current, { isCorrect });

    await this.db
      .insert(PlayerModel)
      .values({
        handle: next.handle,
        displayName: next.displayName,
        totalPoints: next.totalPoints,
        correctCount: next.correctCount,
        totalCount: next.totalCount,
        firstSeenAt: next.firstSeenAt,
      })
      .onConflictDoUpdate({
        target: PlayerModel.handle,
        set: {
          totalPoints: next.totalPoints,
          correctCount: next.correctCount,
          totalCount: next.totalCount,
        },
      });
    return next;
  }

  async findByHandle(handle: string): Promise<Player | null> {
    const rows = await this.db
      .select()
      .from(PlayerModel)
      .where(eq(PlayerModel.handle, handle))
      .limit(1);
    if (rows.length === 0) return null;

    const row = rows[0];
    return {
      handle: row.handle,
      displayName: row.displayName,
      totalPoints: row.totalPoints,
      correctCount: row.correctCount,
      totalCount: row.totalCount,
      firstSeenAt: row.firstSeenAt,
    };
  }
}
