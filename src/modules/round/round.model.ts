// src/modules/round/round.model.ts
import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import { timestamps } from "../../db/helpers/timestamps.helpers";
import { RoundState } from "../../enums";
import { TournamentModel } from "../tournament/tournament.model";

export const RoundModel = pgTable("rounds", {
  roundID: serial("round_id").primaryKey(),
  sequenceNumber: integer("sequence_number").notNull().unique(),
  state: varchar("state", { length: 16 }).$type<RoundState>().notNull(),
  answer: text("answer").notNull(),
  sourceName: varchar("source_name", { length: 128 }).notNull(),
  tournamentID: integer("tournament_id").references(
    () => TournamentModel.tournamentID
  ),
  roundPostRef: text("round_post_ref").notNull(),
  endPostRef: text("end_post_ref"),
  resultsPostRef: text("results_post_ref"),
  percent: integer("percent"),
  attempts: integer("attempts"),
  startedAt: timestamp("started_at").defaultNow().notNull(),
  endedAt: timestamp("ended_at"),
  ...timestamps,
});
