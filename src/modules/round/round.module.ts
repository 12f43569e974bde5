// src/modules/round/round.module.ts
import { Module } from "@nestjs/common";
import { GAME_CONFIG, GameConfig } from "../../config/game-config";
import { RANDOM_SOURCE } from "../question/question-selector";
import { QuestionModule } from "../question/question.module";
import { RecoveryService } from "../recovery/recovery.service";
import {
  CLOCK,
  ManualAdvanceWaiter,
  ROUND_WAITER,
  systemClock,
  TimerWaiter,
} from "../scheduling/round-waiter";
import { SocialModule } from "../social/social.module";
import { GameLoopService } from "./game-loop.service";

@Module({
  imports: [QuestionModule, SocialModule],
  providers: [
    {
      provide: ROUND_WAITER,
      useFactory: (config: GameConfig) =>
        config.manualAdvance ? new ManualAdvanceWaiter() : new TimerWaiter(),
      inject: [GAME_CONFIG],
    },
    { provide: CLOCK, useValue: systemClock },
    { provide: RANDOM_SOURCE, useValue: Math.random },
    RecoveryService,
    GameLoopService,
  ],
  exports: [GameLoopService],
})
export class RoundModule {}
