// src/modules/matcher/answer-matcher.ts

const LEADING_ARTICLES = new Set(["the", "a", "an"]);

/**
 * Normalizes free text for comparison: strips diacritics and punctuation,
 * lowercases, collapses whitespace and drops a leading article.
 */
export function normalizeAnswer(text: string): string {
  const words = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0);

  if (words.length > 1 && LEADING_ARTICLES.has(words[0])) {
    words.shift();
  }
  return words.join(" ");
}

export function levenshteinDistance(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, j) => j);
  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost,
        current[j - 1] + 1,
        previous[j] + 1
      );
    }
    previous = current;
  }
  return previous[right.length];
}

/** Edit-distance similarity of two already normalized strings, 0-100. */
export function ratio(a: string, b: string): number {
  if (a === b) return 100;
  const lengthA = Array.from(a).length;
  const lengthB = Array.from(b).length;
  if (lengthA === 0 || lengthB === 0) return 0;
  const distance = levenshteinDistance(a, b);
  return Math.round(100 * (1 - distance / Math.max(lengthA, lengthB)));
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(" ").filter((token) => token.length > 0));
}

const joinTokens = (...parts: string[]) =>
  parts.filter((part) => part.length > 0).join(" ");

/**
 * Word-order and duplicate insensitive similarity: compares the shared
 * tokens against each side's full token set.
 */
export function tokenSetRatio(a: string, b: string): number {
  const left = tokenSet(a);
  const right = tokenSet(b);

  const shared = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();

  const t0 = shared.join(" ");
  const t1 = joinTokens(t0, onlyLeft.join(" "));
  const t2 = joinTokens(t0, onlyRight.join(" "));

  return Math.max(ratio(t0, t1), ratio(t0, t2), ratio(t1, t2));
}

/**
 * Scores a guess against the correct answer, 0-100. An empty guess scores 0
 * and identical normalized strings score 100.
 */
export function scoreAnswer(correctAnswer: string, candidate: string): number {
  const guess = normalizeAnswer(candidate);
  if (guess.length === 0) return 0;

  const answer = normalizeAnswer(correctAnswer);
  if (guess === answer) return 100;

  return Math.max(ratio(answer, guess), tokenSetRatio(answer, guess));
}

export function isCorrectScore(score: number, threshold: number): boolean {
  return score >= threshold;
}
