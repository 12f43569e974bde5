// src/modules/question/question.entity.ts

export interface MediaItem {
  readonly bytes: Buffer;
  readonly mimeType: string;
  readonly altText: string;
}

export interface Question {
  readonly text: string;
  readonly answer: string;
  readonly media: readonly MediaItem[];
  readonly category: string;
  readonly sourceMetadata: Readonly<Record<string, unknown>>;
}
