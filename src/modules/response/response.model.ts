// src/modules/response/response.model.ts
import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  boolean,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { timestamps } from "../../db/helpers/timestamps.helpers";
import { RoundModel } from "../round/round.model";

export const ResponseModel = pgTable(
  "responses",
  {
    responseID: serial("response_id").primaryKey(),
    roundID: integer("round_id")
      .notNull()
      .references(() => RoundModel.roundID, { onDelete: "cascade" }),
    handle: varchar("handle", { length: 256 }).notNull(),
    rawText: text("raw_text").notNull(),
    score: integer("score").notNull(),
    isCorrect: boolean("is_correct").notNull(),
    position: integer("position").notNull(),
    recordedAt: timestamp("recorded_at").defaultNow().notNull(),
    ...timestamps,
  },
  (table) => [
    uniqueIndex("responses_round_position").on(table.roundID, table.position),
  ]
);
