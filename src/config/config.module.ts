// src/config/config.module.ts
import { DynamicModule, Global, Module } from "@nestjs/common";
import { LoggingService } from "../utils/logger";
import { GAME_CONFIG, GameConfig, loadGameConfig } from "./game-config";

@Global()
@Module({})
export class GameConfigModule {
  /** Binds the given config, or the one read from the environment. */
  static forRoot(config?: GameConfig): DynamicModule {
    return {
      module: GameConfigModule,
      providers: [
        config
          ? { provide: GAME_CONFIG, useValue: config }
          : { provide: GAME_CONFIG, useFactory: loadGameConfig },
        LoggingService,
      ],
      exports: [GAME_CONFIG, LoggingService],
    };
  }
}
