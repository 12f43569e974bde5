// src/db/game-store.ts
import type { GameDatabase } from ".";
import type { PlayerRepository } from "../modules/player/player.repository";
import { DrizzlePlayerRepository } from "../modules/player/player.repository";
import type { ResponseRepository } from "../modules/response/response.repository";
import { DrizzleResponseRepository } from "../modules/response/response.repository";
import type { RoundRepository } from "../modules/round/round.repository";
import { DrizzleRoundRepository } from "../modules/round/round.repository";
import type { TournamentRepository } from "../modules/tournament/tournament.repository";
import { DrizzleTournamentRepository } from "../modules/tournament/tournament.repository";

export const GAME_STORE = "GAME_STORE";

export interface GameRepositories {
  rounds: RoundRepository;
  responses: ResponseRepository;
  players: PlayerRepository;
  tournaments: TournamentRepository;
}

export interface GameStore extends GameRepositories {
  /**
   * Runs `work` against repositories bound to one transaction. Everything it
   * writes is committed together, or rolled back when it throws.
   */
  transaction<T>(work: (repositories: GameRepositories) => Promise<T>): Promise<T>;
}

export class DrizzleGameStore implements GameStore {
  readonly rounds: RoundRepository;
  readonly responses: ResponseRepository;
  readonly players: PlayerRepository;
  readonly tournaments: TournamentRepository;

  constructor(private readonly db: GameDatabase) {
    this.rounds = new DrizzleRoundRepository(db);
    this.responses = new DrizzleResponseRepository(db);
    this.players = new DrizzlePlayerRepository(db);
    this.tournaments = new DrizzleTournamentRepository(db);
  }

  transaction<T>(work: (repositories: GameRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleGameStore(tx)));
  }
}
