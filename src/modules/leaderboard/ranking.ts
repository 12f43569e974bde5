// src/modules/leaderboard/ranking.ts
import type { Player } from "../player/player.entity";
import type { RoundResponse } from "../response/response.entity";

/** Tournament points for the 1st, 2nd, 3rd... correct respondent. */
export type BonusTable = readonly number[];

export const DEFAULT_BONUS_TABLE: BonusTable = [3, 2, 1];

export interface RankedResponse {
  response: RoundResponse;
  /** 1-based rank among correct responses only. */
  placement: number;
  bonus: number;
}

export function bonusFor(placement: number, bonusTable: BonusTable): number {
  return bonusTable[placement - 1] ?? 0;
}

/**
 * Orders the correct responses by arrival position. Positions are unique per
 * round, so the order is total.
 */
export function rank(
  responses: readonly RoundResponse[],
  bonusTable: BonusTable = DEFAULT_BONUS_TABLE
): RankedResponse[] {
  return responses
    .filter((response) => response.isCorrect)
    .sort((a, b) => a.position - b.position)
    .map((response, index) => ({
      response,
      placement: index + 1,
      bonus: bonusFor(index + 1, bonusTable),
    }));
}

/** Additive tournament points per handle. */
export function computeTournamentDelta(
  rankedCorrect: readonly RankedResponse[],
  bonusTable: BonusTable = DEFAULT_BONUS_TABLE
): Map<string, number> {
  const delta = new Map<string, number>();
  for (const ranked of rankedCorrect) {
    const handle = ranked.response.respondentHandle;
    const points = bonusFor(ranked.placement, bonusTable);
    delta.set(handle, (delta.get(handle) ?? 0) + points);
  }
  return delta;
}

/**
 * Global points are a flat +1 per correct answer; placement bonuses only
 * count towards tournament standings.
 */
export function updatePlayerAggregate(
  player: Player,
  response: Pick<RoundResponse, "isCorrect">
): Player {
  const correct = response.isCorrect ? 1 : 0;
  return {
    ...player,
    totalCount: player.totalCount + 1,
    correctCount: player.correctCount + correct,
    totalPoints: player.totalPoints + correct,
  };
}

/** Percentage of correct answers, rounded half up. */
export function successRate(correctCount: number, totalCount: number): number {
  if (totalCount <= 0) {
    throw new RangeError("successRate needs at least one response");
  }
  return Math.floor((correctCount * 100) / totalCount + 0.5);
}
