import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { DATABASE, type GameDatabase, testDbConnection } from "./db";
import { TRIVIA_BANK_STORE, type TriviaBankStore } from "./modules/question/providers/trivia-bank.store";
import { seedTriviaBank } from "./modules/question/providers/trivia-bank.seed";
import { GameLoopService } from "./modules/round/game-loop.service";
import { LoggingService } from "./utils/logger";

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ["error", "warn"],
  });
  // SIGINT/SIGTERM close the context, which stops the loop.
  app.enableShutdownHooks();

  const logger = app.get(LoggingService);
  await testDbConnection(app.get<GameDatabase>(DATABASE));
  logger.logInfo("Database connection established");

  const seeded = await seedTriviaBank(app.get<TriviaBankStore>(TRIVIA_BANK_STORE));
  if (seeded > 0) {
    logger.logInfo("Seeded the trivia bank", { entries: seeded });
  }

  await app.get(GameLoopService).start();
}

bootstrap().catch((err) => {
  console.error("Error during application bootstrap:", err);
  process.exit(1);
});
