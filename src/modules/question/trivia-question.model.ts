// src/modules/question/trivia-question.model.ts
import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  customType,
} from "drizzle-orm/pg-core";
import { timestamps } from "../../db/helpers/timestamps.helpers";

const bytea = customType<{ data: Buffer }>({
  dataType() {
    return "bytea";
  },
});

export const TriviaQuestionModel = pgTable("trivia_questions", {
  questionID: serial("question_id").primaryKey(),
  question: text("question").notNull(),
  answer: text("answer").notNull(),
  category: varchar("category", { length: 128 }).notNull().default("General"),
  difficulty: varchar("difficulty", { length: 32 }).notNull().default("medium"),
  ...timestamps,
});

export const TriviaMediaModel = pgTable("trivia_media", {
  mediaID: serial("media_id").primaryKey(),
  questionID: integer("question_id")
    .notNull()
    .references(() => TriviaQuestionModel.questionID, { onDelete: "cascade" }),
  bytes: bytea("bytes").notNull(),
  mimeType: varchar("mime_type", { length: 64 }).notNull(),
  altText: text("alt_text").notNull().default(""),
});
