// src/app.module.ts
import { Module } from "@nestjs/common";
import { GameConfigModule } from "./config/config.module";
import { DatabaseModule } from "./db/database.module";
import * as modules from "./modules";

@Module({
  imports: [GameConfigModule.forRoot(), DatabaseModule, modules.RoundModule],
})
export class AppModule {}
