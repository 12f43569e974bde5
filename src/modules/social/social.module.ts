// src/modules/social/social.module.ts
import { Module } from "@nestjs/common";
import { GAME_CONFIG, GameConfig } from "../../config/game-config";
import { LoggingService } from "../../utils/logger";
import { ConsoleFeedPublisher } from "./console-feed.publisher";
import { SOCIAL_PUBLISHER, type SocialPublisher } from "./social-publisher.interface";

export function buildPublisher(config: GameConfig, logger: LoggingService): SocialPublisher {
  if (!config.dryRun) {
    throw new Error("DRY_RUN=false needs a network feed client and none is bundled");
  }
  return new ConsoleFeedPublisher(logger);
}

@Module({
  providers: [
    {
      provide: SOCIAL_PUBLISHER,
      useFactory: buildPublisher,
      inject: [GAME_CONFIG, LoggingService],
    },
  ],
  exports: [SOCIAL_PUBLISHER],
})
export class SocialModule {}
