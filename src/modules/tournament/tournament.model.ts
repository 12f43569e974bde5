// src/modules/tournament/tournament.model.ts
import {
  pgTable,
  serial,
  integer,
  varchar,
  boolean,
  timestamp,
  primaryKey,
} from "drizzle-orm/pg-core";
import { timestamps } from "../../db/helpers/timestamps.helpers";

export const TournamentModel = pgTable("tournaments", {
  tournamentID: serial("tournament_id").primaryKey(),
  name: varchar("name", { length: 256 }).notNull(),
  startedAt: timestamp("started_at").notNull(),
  endsAt: timestamp("ends_at").notNull(),
  isActive: boolean("is_active").notNull().default(true),
  totalRounds: integer("total_rounds").notNull().default(0),
  roundsCompleted: integer("rounds_completed").notNull().default(0),
  ...timestamps,
});

export const TournamentStandingModel = pgTable(
  "tournament_standings",
  {
    tournamentID: integer("tournament_id")
      .notNull()
      .references(() => TournamentModel.tournamentID),
    handle: varchar("handle", { length: 256 }).notNull(),
    points: integer("points").notNull().default(0),
    correctCount: integer("correct_count").notNull().default(0),
    totalCount: integer("total_count").notNull().default(0),
    ...timestamps,
  },
  (table) => [primaryKey({ columns: [table.tournamentID, table.handle] })]
);
