// src/modules/response/response.entity.ts
import type { RoundId } from "../round/round.entity";

export interface RoundResponse {
  roundId: RoundId;
  respondentHandle: string;
  rawText: string;
  /** Similarity to the answer, 0-100. */
  score: number;
  isCorrect: boolean;
  /** 1-based arrival order among every reply to the round. */
  position: number;
  recordedAt: Date;
}

export type CreateResponseInput = RoundResponse;
