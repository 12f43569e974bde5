import { beforeEach, describe, expect, it, vi } from "vitest";
import { parseGameConfig } from "../../config/game-config";
import { GameErrorKind, RoundStage, RoundState } from "../../enums";
import { ExhaustedSourceError, NoProviderConfiguredError } from "../../errors";
import { RecoveryService } from "../../modules/recovery/recovery.service";
import { GameLoopService } from "../../modules/round/game-loop.service";
import { TimerWaiter, type RoundWaiter } from "../../modules/scheduling/round-waiter";
import {
  discardedRound,
  internalProblem,
  noQuestionAvailable,
} from "../../modules/round/round.posts";
import type { LoggingService } from "../../utils/logger";
import { InMemoryGameStore } from "../helpers/in-memory-store";
import {
  createImagePreparer,
  createTestLogger,
  createWaiter,
  FakePublisher,
  type FakeWaiter,
  question,
  StubProvider,
} from "../helpers/fakes";

const NOW = new Date(Date.UTC(2024, 2, 1, 10, 0));

describe("GameLoopService", () => {
  let store: InMemoryGameStore;
  let publisher: FakePublisher;
  let provider: StubProvider;
  let waiter: FakeWaiter;
  let logger: LoggingService;

  beforeEach(() => {
    store = new InMemoryGameStore();
    publisher = new FakePublisher();
    provider = new StubProvider("General Trivia");
    provider.draw.mockResolvedValue(question("Lisbon"));
    waiter = createWaiter();
    logger = createTestLogger();
  });

  function createLoop(providers = [provider], roundWaiter: RoundWaiter = waiter) {
    return new GameLoopService(
      store,
      publisher,
      providers,
      createImagePreparer(),
      roundWaiter,
      () => NOW,
      () => 0,
      parseGameConfig({}),
      logger,
      new RecoveryService(store, publisher, logger)
    );
  }

  async function storeRound(sequenceNumber: number, state: RoundState) {
    const id = await store.rounds.create({
      sequenceNumber,
      state,
      answer: "Porto",
      roundPostId: `announcement-${sequenceNumber}`,
      sourceName: "General Trivia",
    });
    return id;
  }

  it("plays a full round and waits for the next one", async () => {
    publisher.replies = [
      { authorHandle: "ana", text: "Lisbon", arrivalOrder: 1, postRef: "reply-1" },
    ];

    expect(await createLoop().runRound()).toBe("completed");

    expect(store.round(1)?.state).toBe(RoundState.Results);
    expect(waiter.wait.mock.calls).toEqual([
      [30, "collecting replies for round #1"],
      [30, "waiting for the next round"],
    ]);
  });

  it("cools down after a skipped round", async () => {
    expect(await createLoop().runRound()).toBe("skipped");
    expect(waiter.wait).toHaveBeenLastCalledWith(5, "cooldown after a skipped round");
  });

  it("continues numbering after the last stored round", async () => {
    await storeRound(41, RoundState.Results);

    await createLoop().runRound();

    expect(publisher.posts[0].text.startsWith("🎮 General Trivia: Round #42\n")).toBe(true);
  });

  it("does not reuse the number of a discarded round", async () => {
    await storeRound(41, RoundState.Collecting);

    await createLoop().runRound();

    expect(publisher.texts()[0]).toBe(discardedRound(41, "Porto"));
    expect(publisher.posts[1].text.startsWith("🎮 General Trivia: Round #42\n")).toBe(true);
    expect(store.state.rounds.map((round) => round.sequenceNumber)).toEqual([42]);
  });

  it("posts a skip notice when no question is available", async () => {
    provider.draw.mockRejectedValue(new ExhaustedSourceError("General Trivia"));

    expect(await createLoop().runRound()).toBe("failed");

    expect(publisher.texts()).toEqual([noQuestionAvailable()]);
    expect(store.state.rounds).toEqual([]);
    expect(waiter.wait).toHaveBeenLastCalledWith(1, "cooldown after a failed round");
    expect(logger.logError).toHaveBeenCalledWith(
      'Round failed: Question source "General Trivia" could not produce a question',
      expect.objectContaining({
        round: 1,
        stage: RoundStage.Begin,
        kind: GameErrorKind.ExhaustedSource,
        retryable: true,
      })
    );
  });

  it("hands the number of a round that never got stored to the next round", async () => {
    provider.draw.mockRejectedValueOnce(new ExhaustedSourceError("General Trivia"));
    const loop = createLoop();

    expect(await loop.runRound()).toBe("failed");
    expect(await loop.runRound()).toBe("skipped");

    expect(publisher.posts[1].text.startsWith("🎮 General Trivia: Round #1\n")).toBe(true);
    expect(store.state.rounds.map((round) => round.sequenceNumber)).toEqual([1]);
  });

  it("hands back the number when the announcement cannot be posted", async () => {
    publisher.publish.mockRejectedValueOnce(new Error("rate limited"));
    const loop = createLoop();

    expect(await loop.runRound()).toBe("failed");
    expect(await loop.runRound()).toBe("skipped");

    expect(store.state.rounds.map((round) => round.sequenceNumber)).toEqual([1]);
  });

  it("sweeps a half-played round before the next attempt", async () => {
    publisher.fetchThreadReplies.mockRejectedValueOnce(new Error("timeout"));
    const loop = createLoop();

    expect(await loop.runRound()).toBe("failed");
    expect(publisher.texts()[2]).toBe(internalProblem());
    expect(store.round(1)?.state).toBe(RoundState.Scoring);

    expect(await loop.runRound()).toBe("skipped");

    expect(publisher.retract).toHaveBeenCalledWith("post-1");
    expect(publisher.texts()[3]).toBe(discardedRound(1, "Lisbon"));
    expect(publisher.posts[4].text.startsWith("🎮 General Trivia: Round #2\n")).toBe(true);
    expect(store.state.rounds.map((round) => [round.sequenceNumber, round.state])).toEqual([
      [2, RoundState.Skipped],
    ]);
  });

  it("retries when the recovery sweep fails", async () => {
    vi.spyOn(store.rounds, "lastRound").mockRejectedValueOnce(new Error("connection refused"));

    expect(await createLoop().runRound()).toBe("failed");

    expect(publisher.posts).toEqual([]);
    expect(waiter.wait.mock.calls).toEqual([[1, "retrying recovery"]]);
  });

  it("refuses to start without providers", async () => {
    await expect(createLoop([]).start()).rejects.toBeInstanceOf(NoProviderConfiguredError);
  });

  it("runs until stopped", async () => {
    const loop = createLoop();
    waiter.wait.mockImplementation(async (_minutes, reason) => {
      if (reason === "cooldown after a skipped round") loop.stop();
    });

    await loop.start();

    expect(loop.isRunning).toBe(false);
    expect(waiter.cancel).toHaveBeenCalledTimes(1);
    expect(store.state.rounds).toHaveLength(1);
  });

  it("abandons the round when shut down during the collection window", async () => {
    publisher.replies = [
      { authorHandle: "ana", text: "Lisbon", arrivalOrder: 1, postRef: "reply-1" },
    ];
    const timer = new TimerWaiter();
    const loop = createLoop([provider], timer);

    const pending = loop.runRound();
    await vi.waitFor(() => expect(publisher.posts).toHaveLength(1));
    loop.onApplicationShutdown("SIGTERM");

    expect(await pending).toBe("cancelled");
    expect(publisher.posts).toHaveLength(1);
    expect(publisher.fetchThreadReplies).not.toHaveBeenCalled();
    expect(store.round(1)?.state).toBe(RoundState.Collecting);
    expect(store.state.responses).toEqual([]);
    expect(logger.logError).not.toHaveBeenCalled();
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Round abandoned on shutdown",
      expect.objectContaining({ round: 1, stage: RoundStage.Collect, state: RoundState.Collecting })
    );
  });

  it("sweeps the abandoned round on the next start", async () => {
    const timer = new TimerWaiter();
    const first = createLoop([provider], timer);
    const pending = first.runRound();
    await vi.waitFor(() => expect(publisher.posts).toHaveLength(1));
    first.stop();
    await pending;

    expect(await createLoop().runRound()).toBe("skipped");

    expect(publisher.texts()[1]).toBe(discardedRound(1, "Lisbon"));
    expect(publisher.posts[2].text.startsWith("🎮 General Trivia: Round #2\n")).toBe(true);
    expect(store.state.rounds.map((round) => round.sequenceNumber)).toEqual([2]);
  });

  it("stops on application shutdown", () => {
    const loop = createLoop();
    loop.onApplicationShutdown("SIGTERM");
    expect(waiter.cancel).toHaveBeenCalledTimes(1);
  });
});
