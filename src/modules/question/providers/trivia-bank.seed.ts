// src/modules/question/providers/trivia-bank.seed.ts
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import type { NewTriviaBankEntry, TriviaBankStore } from "./trivia-bank.store";

export const SAMPLE_TRIVIA_PATH = path.resolve(
  __dirname,
  "../../../../data/sample-trivia.json"
);

interface SeedRow {
  question: string;
  answer: string;
  category?: string;
  difficulty?: string;
}

function isSeedRow(value: unknown): value is SeedRow {
  return (
    typeof value === "object" &&
    value !== null &&
    "question" in value &&
    typeof value.question === "string" &&
    "answer" in value &&
    typeof value.answer === "string" &&
    (!("category" in value) || typeof value.category === "string") &&
    (!("difficulty" in value) || typeof value.difficulty === "string")
  );
}

export async function readSeedFile(file: string): Promise<NewTriviaBankEntry[]> {
  const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Trivia seed file ${file} must contain an array`);
  }
  return parsed.filter(isSeedRow).map((row) => ({
    question: row.question,
    answer: row.answer,
    category: row.category ?? "General",
    difficulty: row.difficulty ?? "medium",
  }));
}

/** Fills an empty bank from the seed file. Returns how many entries were added. */
export async function seedTriviaBank(
  store: TriviaBankStore,
  file: string = SAMPLE_TRIVIA_PATH
): Promise<number> {
  if ((await store.size()) > 0) return 0;
  const entries = await readSeedFile(file);
  for (const entry of entries) {
    await store.add(entry);
  }
  return entries.length;
}
