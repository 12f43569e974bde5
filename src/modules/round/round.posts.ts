// src/modules/round/round.posts.ts

export const DEFAULT_POST_BUDGET = 280;

export const TIPS = [
  "Typos are fine: if you write it mostly right, it still counts!",
  "Correct guesses get a like once the round is over.",
  "Replying to other comments won't affect the final result.",
] as const;

const MEDALS = ["🥇", "🥈", "🥉"] as const;

/** Post length in code points, so an emoji counts once. */
export function postLength(text: string): number {
  return Array.from(text).length;
}

const pad = (value: number) => String(value).padStart(2, "0");

/** Formats as `DD/MM/YYYY, HH:MMAM UTC`. */
export function formatDeadline(at: Date): string {
  const hours = at.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? "AM" : "PM";
  return (
    `${pad(at.getUTCDate())}/${pad(at.getUTCMonth() + 1)}/${at.getUTCFullYear()}, ` +
    `${pad(hour12)}:${pad(at.getUTCMinutes())}${meridiem} UTC`
  );
}

export function addMinutes(at: Date, minutes: number): Date {
  return new Date(at.getTime() + minutes * 60 * 1000);
}

export interface AnnouncementInput {
  sequenceNumber: number;
  sourceName: string;
  questionText: string;
  windowMinutes: number;
  now: Date;
  tip: string;
  tournamentName?: string | null;
}

export function roundAnnouncement(input: AnnouncementInput): string {
  const deadline = formatDeadline(addMinutes(input.now, input.windowMinutes));
  let text =
    `🎮 ${input.sourceName}: Round #${input.sequenceNumber}\n\n` +
    `${input.questionText}\n\n` +
    `You have ${input.windowMinutes} min (${deadline}) to make a guess. Good luck!\n\n` +
    `(TIP: ${input.tip})`;
  if (input.tournamentName) {
    text += `\n\n🏆 This is a tournament round! 🏆\nTournament: ${input.tournamentName}`;
  }
  return text;
}

export function timeIsUp(sequenceNumber: number): string {
  return (
    `⏰ The time is up, everyone! (Round #${sequenceNumber})\n\n` +
    "You've made your guesses, and we're counting all of them. " +
    "In a moment we'll post the results!"
  );
}

export function insufficientParticipation(sequenceNumber: number): string {
  return (
    `😥 Not a single user has commented in round #${sequenceNumber}.\n\n` +
    "Skipping it for now..."
  );
}

export function noQuestionAvailable(): string {
  return "😶 We couldn't find a question for this round. Skipping it for now...";
}

export function discardedRound(sequenceNumber: number, answer: string): string {
  return (
    "⚠️ It looks like there was a problem and we had to remove the last round " +
    `(#${sequenceNumber}). The answer was "${answer}".\n\n` +
    "We're very sorry. A new round is coming right up!"
  );
}

export function internalProblem(): string {
  return (
    "😵 Oops! It looks like we ran into an internal problem. " +
    "We'll be investigating the issue and the game will resume ASAP"
  );
}

export interface ResultsInput {
  sequenceNumber: number;
  percent: number;
  answer: string;
  answerLabel: string;
  attempts: number;
  topHandles: readonly string[];
  tournamentName?: string | null;
  nextRoundMinutes: number;
  now: Date;
}

/**
 * Composes the results post from ordered sections: headline, answer,
 * podium, tournament banner, next-round footer. Sections are appended while
 * they fit the budget and composition stops at the first one that doesn't.
 * The headline is always kept.
 */
export function roundResults(
  input: ResultsInput,
  budget: number = DEFAULT_POST_BUDGET
): string {
  const headline =
    input.percent < 50
      ? `😿 Round #${input.sequenceNumber}: ${input.percent}% success.\n`
      : `🏆 Round #${input.sequenceNumber}: ${input.percent}% success! Congrats!\n`;

  const sections: string[] = [
    `The ${input.answerLabel} was: ${input.answer}.\nAttempts: ${input.attempts}\n`,
  ];

  const podium = input.topHandles.slice(0, MEDALS.length);
  if (podium.length > 0) {
    sections.push(
      "Fastest correct answers:\n" +
        podium.map((handle, index) => `${MEDALS[index]} @${handle}\n`).join("")
    );
  }
  if (input.tournamentName) {
    sections.push(`🏆 Tournament: ${input.tournamentName}\n`);
  }
  const nextAt = formatDeadline(addMinutes(input.now, input.nextRoundMinutes));
  sections.push(`Next round in ${input.nextRoundMinutes} min (${nextAt})`);

  let text = truncate(headline, budget);
  for (const section of sections) {
    if (postLength(text) + postLength(section) > budget) break;
    text += section;
  }
  return text;
}

function truncate(text: string, budget: number): string {
  const chars = Array.from(text);
  if (chars.length <= budget) return text;
  return chars.slice(0, budget - 1).join("") + "…";
}
