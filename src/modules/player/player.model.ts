// src/modules/player/player.model.ts
import {
  pgTable,
  serial,
  integer,
  varchar,
  timestamp,
} from "drizzle-orm/pg-core";
import { timestamps } from "../../db/helpers/timestamps.helpers";

export const PlayerModel = pgTable("players", {
  playerID: serial("player_id").primaryKey(),
  handle: varchar("handle", { length: 256 }).unique().notNull(),
  displayName: varchar("display_name", { length: 256 }),
  totalPoints: integer("total_points").notNull().default(0),
  correctCount: integer("correct_count").notNull().default(0),
  totalCount: integer("total_count").notNull().default(0),
  firstSeenAt: timestamp("first_seen_at").defaultNow().notNull(),
  ...timestamps,
});
