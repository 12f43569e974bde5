// src/modules/recovery/recovery.service.ts
import { Inject, Injectable } from "@nestjs/common";
import { GAME_STORE, type GameStore } from "../../db/game-store";
import { isTerminalState, RoundStage } from "../../enums";
import { attemptCleanup, guardPersistence } from "../../errors/guards";
import { LoggingService } from "../../utils/logger";
import type { Round } from "../round/round.entity";
import { discardedRound } from "../round/round.posts";
import { SOCIAL_PUBLISHER, type SocialPublisher } from "../social/social-publisher.interface";

/**
 * Discards the most recent round when it never reached a terminal state:
 * its posts are retracted, its rows deleted and the audience told the answer.
 * Running it again afterwards finds nothing to do.
 */
@Injectable()
export class RecoveryService {
  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    @Inject(SOCIAL_PUBLISHER) private readonly publisher: SocialPublisher,
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {}

  async sweep(): Promise<Round | null> {
    const last = await guardPersistence("read the last round", () =>
      this.store.rounds.lastRound()
    );
    if (!last || isTerminalState(last.state)) {
      this.logger.logDebug("Recovery sweep found nothing to discard", {
        stage: RoundStage.Recovery,
        round: last?.sequenceNumber ?? null,
      });
      return null;
    }

    const meta = {
      stage: RoundStage.Recovery,
      round: last.sequenceNumber,
      state: last.state,
    };
    this.logger.logWarn("Discarding unfinished round", meta);

    const { roundPostId, endPostId } = last.postRefs;
    await attemptCleanup(this.logger, "retract the round announcement", meta, () =>
      this.publisher.retract(roundPostId)
    );
    if (endPostId !== undefined) {
      await attemptCleanup(this.logger, "retract the time's up notice", meta, () =>
        this.publisher.retract(endPostId)
      );
    }

    await guardPersistence(`discard round #${last.sequenceNumber}`, () =>
      this.store.transaction(async (repos) => {
        await repos.responses.deleteByRound(last.id);
        await repos.rounds.delete(last.id);
      })
    );

    await attemptCleanup(this.logger, "publish the discarded round notice", meta, () =>
      this.publisher.publish(discardedRound(last.sequenceNumber, last.answer))
    );
    return last;
  }
}
