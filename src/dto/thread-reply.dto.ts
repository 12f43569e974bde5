// src/dto/thread-reply.dto.ts
import { plainToInstance } from "class-transformer";
import { IsInt, IsNotEmpty, IsString, Min, validateSync } from "class-validator";
import type { ThreadReply } from "../modules/social/social-publisher.interface";

export class ThreadReplyDto implements ThreadReply {
  @IsNotEmpty()
  @IsString()
  authorHandle!: string;

  @IsString()
  text!: string;

  @IsInt()
  @Min(1)
  arrivalOrder!: number;

  @IsNotEmpty()
  @IsString()
  postRef!: string;
}

export type ReplyParseResult =
  | { ok: true; reply: ThreadReply }
  | { ok: false; problems: string[] };

export function parseThreadReply(raw: unknown): ReplyParseResult {
  if (typeof raw !== "object" || raw === null) {
    return { ok: false, problems: ["reply is not an object"] };
  }
  const dto = plainToInstance(ThreadReplyDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    return {
      ok: false,
      problems: errors.map((error) => error.property),
    };
  }
  return {
    ok: true,
    reply: {
      authorHandle: dto.authorHandle,
      text: dto.text,
      arrivalOrder: dto.arrivalOrder,
      postRef: dto.postRef,
    },
  };
}
