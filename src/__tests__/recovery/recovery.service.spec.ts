import { beforeEach, describe, expect, it } from "vitest";
import { RoundState } from "../../enums";
import { RecoveryService } from "../../modules/recovery/recovery.service";
import { discardedRound } from "../../modules/round/round.posts";
import type { LoggingService } from "../../utils/logger";
import { InMemoryGameStore } from "../helpers/in-memory-store";
import { createTestLogger, FakePublisher } from "../helpers/fakes";

describe("RecoveryService", () => {
  let store: InMemoryGameStore;
  let publisher: FakePublisher;
  let logger: LoggingService;
  let recovery: RecoveryService;

  beforeEach(() => {
    store = new InMemoryGameStore();
    publisher = new FakePublisher();
    logger = createTestLogger();
    recovery = new RecoveryService(store, publisher, logger);
  });

  async function storeRound(sequenceNumber: number, state: RoundState) {
    const id = await store.rounds.create({
      sequenceNumber,
      state: RoundState.Initial,
      answer: "Lisbon",
      roundPostId: `announcement-${sequenceNumber}`,
      sourceName: "General Trivia",
    });
    await store.rounds.updateState(id, state);
    return id;
  }

  it("discards an unfinished round and tells the audience", async () => {
    await storeRound(4, RoundState.Results);
    const id = await storeRound(5, RoundState.Scoring);
    await store.rounds.updatePostRefs(id, { endPostId: "times-up-5" });
    await store.responses.create({
      roundId: id,
      respondentHandle: "ana",
      rawText: "Lisbon",
      score: 100,
      isCorrect: true,
      position: 1,
      recordedAt: new Date(Date.UTC(2024, 0, 1)),
    });

    const discarded = await recovery.sweep();

    expect(discarded).toMatchObject({ sequenceNumber: 5, answer: "Lisbon" });
    expect(publisher.retract.mock.calls).toEqual([["announcement-5"], ["times-up-5"]]);
    expect(store.state.rounds.map((round) => round.sequenceNumber)).toEqual([4]);
    expect(store.state.responses).toEqual([]);
    expect(publisher.texts()).toEqual([discardedRound(5, "Lisbon")]);
  });

  it("does nothing the second time", async () => {
    await storeRound(5, RoundState.Collecting);

    await recovery.sweep();
    await storeRound(4, RoundState.Results);
    const second = await recovery.sweep();

    expect(second).toBeNull();
    expect(publisher.publish).toHaveBeenCalledTimes(1);
  });

  it("leaves a finished round alone", async () => {
    await storeRound(3, RoundState.Skipped);

    expect(await recovery.sweep()).toBeNull();
    expect(publisher.retract).not.toHaveBeenCalled();
    expect(store.state.rounds).toHaveLength(1);
  });

  it("handles an empty store", async () => {
    expect(await recovery.sweep()).toBeNull();
  });

  it("still discards the round when a retraction fails", async () => {
    await storeRound(5, RoundState.Collecting);
    publisher.retract.mockRejectedValueOnce(new Error("post not found"));

    expect(await recovery.sweep()).not.toBeNull();
    expect(store.state.rounds).toEqual([]);
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Could not retract the round announcement",
      expect.objectContaining({ round: 5, error: "post not found" })
    );
  });
});
