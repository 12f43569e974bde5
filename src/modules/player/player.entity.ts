// src/modules/player/player.entity.ts

export interface Player {
  handle: string;
  displayName: string | null;
  totalPoints: number;
  correctCount: number;
  totalCount: number;
  firstSeenAt: Date;
}

export function newPlayer(handle: string, firstSeenAt: Date): Player {
  return {
    handle,
    displayName: null,
    totalPoints: 0,
    correctCount: 0,
    totalCount: 0,
    firstSeenAt,
  };
}
