// src/db/database.module.ts
import { Global, Inject, Module, OnApplicationShutdown } from "@nestjs/common";
import pg from "pg";
import { GAME_CONFIG, GameConfig } from "../config/game-config";
import {
  DrizzleTriviaBankStore,
  TRIVIA_BANK_STORE,
} from "../modules/question/providers/trivia-bank.store";
import { createDbClient, createPool, DATABASE, DATABASE_POOL, type GameDatabase } from ".";
import { DrizzleGameStore, GAME_STORE } from "./game-store";

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_POOL,
      useFactory: (config: GameConfig) => createPool(config.databaseUrl),
      inject: [GAME_CONFIG],
    },
    {
      provide: DATABASE,
      useFactory: (pool: pg.Pool) => createDbClient(pool),
      inject: [DATABASE_POOL],
    },
    {
      provide: GAME_STORE,
      useFactory: (db: GameDatabase) => new DrizzleGameStore(db),
      inject: [DATABASE],
    },
    {
      provide: TRIVIA_BANK_STORE,
      useFactory: (db: GameDatabase) => new DrizzleTriviaBankStore(db),
      inject: [DATABASE],
    },
  ],
  exports: [DATABASE, GAME_STORE, TRIVIA_BANK_STORE],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_POOL) private readonly pool: pg.Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
