// src/modules/round/round.entity.ts
import { RoundState } from "../../enums";
import type { PostRef } from "../social/social-publisher.interface";

export type RoundId = number;

export interface PostRefs {
  roundPostId: PostRef;
  endPostId?: PostRef;
  resultsPostId?: PostRef;
}

export interface Round {
  id: RoundId;
  sequenceNumber: number;
  state: RoundState;
  answer: string;
  sourceName: string;
  tournamentId: number | null;
  startedAt: Date;
  endedAt: Date | null;
  percent: number | null;
  attempts: number | null;
  postRefs: PostRefs;
}

export interface CreateRoundInput {
  sequenceNumber: number;
  state: RoundState;
  answer: string;
  roundPostId: PostRef;
  sourceName: string;
  tournamentId?: number | null;
}
