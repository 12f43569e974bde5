// src/modules/question/providers/trivia-bank.provider.ts
import { ExhaustedSourceError } from "../../../errors";
import type { Question } from "../question.entity";
import { BaseQuestionProvider } from "../question-provider.interface";
import type { TriviaBankStore } from "./trivia-bank.store";

export const TRIVIA_SOURCE_NAME = "General Trivia";

export class TriviaBankProvider extends BaseQuestionProvider {
  readonly maxMediaItems = 1;

  constructor(private readonly store: TriviaBankStore) {
    super();
  }

  getSourceName(): string {
    return TRIVIA_SOURCE_NAME;
  }

  async getRandomQuestion(): Promise<Question> {
    const entry = await this.store.randomEntry();
    if (!entry) {
      throw new ExhaustedSourceError(this.getSourceName());
    }
    return {
      text: entry.question,
      answer: entry.answer,
      media: entry.media,
      category: entry.category,
      sourceMetadata: { questionId: entry.id, difficulty: entry.difficulty },
    };
  }
}
