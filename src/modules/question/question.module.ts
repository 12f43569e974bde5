// src/modules/question/question.module.ts
import { Module } from "@nestjs/common";
import { GAME_CONFIG, GameConfig } from "../../config/game-config";
import { LoggingService } from "../../utils/logger";
import { IMAGE_PREPARER, PassthroughImagePreparer } from "../media/image-preparer";
import { MovieBackdropProvider } from "./providers/movie-backdrop.provider";
import { TmdbCatalog } from "./providers/tmdb.catalog";
import { TriviaBankProvider } from "./providers/trivia-bank.provider";
import { TRIVIA_BANK_STORE, type TriviaBankStore } from "./providers/trivia-bank.store";
import { QUESTION_PROVIDERS, type QuestionProvider } from "./question-provider.interface";

export function buildQuestionProviders(
  config: GameConfig,
  bank: TriviaBankStore,
  logger: LoggingService
): QuestionProvider[] {
  const providers: QuestionProvider[] = [new TriviaBankProvider(bank)];
  if (config.tmdbApiKey) {
    providers.push(new MovieBackdropProvider(new TmdbCatalog(config.tmdbApiKey)));
  } else {
    logger.logInfo("TMDB_API_KEY is not set, movie rounds are disabled");
  }
  return providers;
}

@Module({
  providers: [
    {
      provide: QUESTION_PROVIDERS,
      useFactory: buildQuestionProviders,
      inject: [GAME_CONFIG, TRIVIA_BANK_STORE, LoggingService],
    },
    { provide: IMAGE_PREPARER, useClass: PassthroughImagePreparer },
  ],
  exports: [QUESTION_PROVIDERS, IMAGE_PREPARER],
})
export class QuestionModule {}
