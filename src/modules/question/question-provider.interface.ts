// src/modules/question/question-provider.interface.ts
import { scoreAnswer } from "../matcher/answer-matcher";
import type { Question } from "./question.entity";

export const QUESTION_PROVIDERS = "QUESTION_PROVIDERS";

export interface QuestionProvider {
  getSourceName(): string;
  getRandomQuestion(): Promise<Question>;
  /** Returns a 0-100 similarity; the caller applies the threshold. */
  evaluateAnswer(candidate: string, correctAnswer: string, threshold: number): number;
  readonly requiresImageProcessing: boolean;
  readonly maxMediaItems: number;
  /** Noun used when revealing the answer, e.g. "movie". */
  readonly answerLabel: string;
}

export abstract class BaseQuestionProvider implements QuestionProvider {
  abstract getSourceName(): string;
  abstract getRandomQuestion(): Promise<Question>;

  readonly requiresImageProcessing: boolean = false;
  readonly maxMediaItems: number = 0;
  readonly answerLabel: string = "answer";

  evaluateAnswer(candidate: string, correctAnswer: string, _threshold: number): number {
    return scoreAnswer(correctAnswer, candidate);
  }
}
