// src/modules/response/response.repository.ts
import { and, asc, eq } from "drizzle-orm";
import type { GameDatabase } from "../../db";
import type { RoundId } from "../round/round.entity";
import type { CreateResponseInput, RoundResponse } from "./response.entity";
import { ResponseModel } from "./response.model";

export interface ResponseRepository {
  create(input: CreateResponseInput): Promise<number>;
  /** Earliest correct responses of a round, by position. */
  topCorrectByRound(roundId: RoundId, limit: number): Promise<RoundResponse[]>;
  deleteByRound(roundId: RoundId): Promise<number>;
}

export class DrizzleResponseRepository implements ResponseRepository {
  constructor(private readonly db: GameDatabase) {}

  async create(input: CreateResponseInput): Promise<number> {
    const [created] = await this.db
      .insert(ResponseModel)
      .values({
        roundID: input.roundId,
        handle: input.respondentHandle,
        rawText: input.rawText,
        score: input.score,
        isCorrect: input.isCorrect,
        position: input.position,
        recordedAt: input.recordedAt,
      })
      .returning({ id: ResponseModel.responseID });
    return created.id;
  }

  async topCorrectByRound(roundId: RoundId, limit: number): Promise<RoundResponse[]> {
    const rows = await this.db
      .select()
      .from(ResponseModel)
      .where(and(eq(ResponseModel.roundID, roundId), eq(ResponseModel.isCorrect, true)))
      .orderBy(asc(ResponseModel.position))
      .limit(limit);

    return rows.map((row) => ({
      roundId: row.roundID,
      respondentHandle: row.handle,
      rawText: row.rawText,
      score: row.score,
      isCorrect: row.isCorrect,
      position: row.position,
      recordedAt: row.recordedAt,
    }));
  }

  async deleteByRound(roundId: RoundId): Promise<number> {
    const deleted = await this.db
      .delete(ResponseModel)
      .where(eq(ResponseModel.roundID, roundId))
      .returning({ id: ResponseModel.responseID });
    return deleted.length;
  }
}
