// src/modules/question/question-selector.ts
import { ExhaustedSourceError, NoProviderConfiguredError } from "../../errors";
import type { Question } from "./question.entity";
import type { QuestionProvider } from "./question-provider.interface";

export const RANDOM_SOURCE = "RANDOM_SOURCE";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface DrawnQuestion {
  provider: QuestionProvider;
  question: Question;
}

export function assertProviders(providers: readonly QuestionProvider[]): void {
  if (providers.length === 0) {
    throw new NoProviderConfiguredError();
  }
}

/** Uniform random choice among the configured providers. */
export function selectProvider(
  providers: readonly QuestionProvider[],
  random: RandomSource = Math.random
): QuestionProvider {
  assertProviders(providers);
  const index = Math.min(Math.floor(random() * providers.length), providers.length - 1);
  return providers[index];
}

/**
 * Draws a question, falling back to the remaining providers in random order
 * when one is exhausted. Throws the last {@link ExhaustedSourceError} when
 * every provider is exhausted.
 */
export async function drawQuestion(
  providers: readonly QuestionProvider[],
  random: RandomSource = Math.random,
  onExhausted?: (error: ExhaustedSourceError) => void
): Promise<DrawnQuestion> {
  assertProviders(providers);

  const remaining = [...providers];
  let lastError: ExhaustedSourceError | undefined;
  while (remaining.length > 0) {
    const provider = selectProvider(remaining, random);
    remaining.splice(remaining.indexOf(provider), 1);
    try {
      const question = await provider.getRandomQuestion();
      return { provider, question };
    } catch (error) {
      if (!(error instanceof ExhaustedSourceError)) throw error;
      lastError = error;
      onExhausted?.(error);
    }
  }
  throw lastError ?? new ExhaustedSourceError("all sources");
}
