// src/modules/question/providers/trivia-bank.store.ts
import { count, eq, sql } from "drizzle-orm";
import type { GameDatabase } from "../../../db";
import type { MediaItem } from "../question.entity";
import { TriviaMediaModel, TriviaQuestionModel } from "../trivia-question.model";

export const TRIVIA_BANK_STORE = "TRIVIA_BANK_STORE";

export interface TriviaBankEntry {
  id: number;
  question: string;
  answer: string;
  category: string;
  difficulty: string;
  media: MediaItem[];
}

export type NewTriviaBankEntry = Omit<TriviaBankEntry, "id" | "media"> & {
  media?: MediaItem[];
};

export interface TriviaBankStore {
  randomEntry(): Promise<TriviaBankEntry | null>;
  size(): Promise<number>;
  add(entry: NewTriviaBankEntry): Promise<number>;
}

export class DrizzleTriviaBankStore implements TriviaBankStore {
  constructor(private readonly db: GameDatabase) {}

  async randomEntry(): Promise<TriviaBankEntry | null> {
    const [row] = await this.db
      .select()
      .from(TriviaQuestionModel)
      .orderBy(sql`random()`)
      .limit(1);
    if (!row) return null;

    const media = await this.db
      .select()
      .from(TriviaMediaModel)
      .where(eq(TriviaMediaModel.questionID, row.questionID));

    return {
      id: row.questionID,
      question: row.question,
      answer: row.answer,
      category: row.category,
      difficulty: row.difficulty,
      media: media.map((item) => ({
        bytes: item.bytes,
        mimeType: item.mimeType,
        altText: item.altText,
      })),
    };
  }

  async size(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(TriviaQuestionModel);
    return row?.value ?? 0;
  }

  async add(entry: NewTriviaBankEntry): Promise<number> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx
        .insert(TriviaQuestionModel)
        .values({
          question: entry.question,
          answer: entry.answer,
          category: entry.category,
          difficulty: entry.difficulty,
        })
        .returning({ id: TriviaQuestionModel.questionID });

      for (const item of entry.media ?? []) {
        await tx.insert(TriviaMediaModel).values({
          questionID: created.id,
          bytes: item.bytes,
          mimeType: item.mimeType,
          altText: item.altText,
        });
      }
      return created.id;
    });
  }
}
