// src/modules/social/social-publisher.interface.ts
import type { MediaItem } from "../question/question.entity";

export const SOCIAL_PUBLISHER = "SOCIAL_PUBLISHER";

/** Opaque reference to a post on the feed (a URI for most networks). */
export type PostRef = string;

export interface ThreadReply {
  authorHandle: string;
  text: string;
  /** Order in which the feed returned the reply, starting at 1. */
  arrivalOrder: number;
  postRef: PostRef;
}

export interface SocialPublisher {
  /** Handle the bot posts as; its own replies are never scored. */
  readonly handle: string;
  publish(text: string, media?: readonly MediaItem[]): Promise<PostRef>;
  publishReply(text: string, parent: PostRef): Promise<PostRef>;
  fetchThreadReplies(root: PostRef): Promise<unknown[]>;
  like(ref: PostRef): Promise<void>;
  retract(ref: PostRef): Promise<void>;
}
