// src/modules/social/console-feed.publisher.ts
import { Inject, Injectable } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import { LoggingService } from "../../utils/logger";
import type { MediaItem } from "../question/question.entity";
import type { PostRef, SocialPublisher } from "./social-publisher.interface";

/**
 * Dry-run feed: every post is written to the log instead of a network and
 * threads never receive replies.
 */
@Injectable()
export class ConsoleFeedPublisher implements SocialPublisher {
  readonly handle = "trivia-bot.local";

  constructor(@Inject(LoggingService) private readonly logger: LoggingService) {}

  async publish(text: string, media: readonly MediaItem[] = []): Promise<PostRef> {
    const ref = `feed://${this.handle}/${uuidv4()}`;
    this.logger.logInfo("Published post", {
      ref,
      text,
      media: media.map((item) => ({ mimeType: item.mimeType, bytes: item.bytes.length })),
    });
    return ref;
  }

  async publishReply(text: string, parent: PostRef): Promise<PostRef> {
    const ref = `feed://${this.handle}/${uuidv4()}`;
    this.logger.logInfo("Published reply", { ref, parent, text });
    return ref;
  }

  async fetchThreadReplies(root: PostRef): Promise<unknown[]> {
    this.logger.logDebug("Fetched thread replies", { root, count: 0 });
    return [];
  }

  async like(ref: PostRef): Promise<void> {
    this.logger.logDebug("Liked post", { ref });
  }

  async retract(ref: PostRef): Promise<void> {
    this.logger.logInfo("Retracted post", { ref });
  }
}
