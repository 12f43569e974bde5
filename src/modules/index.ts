export * from "./question/question.module";
export * from "./round/round.module";
export * from "./social/social.module";
