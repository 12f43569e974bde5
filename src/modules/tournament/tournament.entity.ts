// src/modules/tournament/tournament.entity.ts

export interface Tournament {
  id: number;
  name: string;
  startedAt: Date;
  endsAt: Date;
  isActive: boolean;
  totalRounds: number;
  roundsCompleted: number;
}

export interface TournamentStanding {
  tournamentId: number;
  handle: string;
  points: number;
  correctCount: number;
  totalCount: number;
}
