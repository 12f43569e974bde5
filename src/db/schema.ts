// src/db/schema.ts
export { RoundModel } from "../modules/round/round.model";
export { ResponseModel } from "../modules/response/response.model";
export { PlayerModel } from "../modules/player/player.model";
export {
  TournamentModel,
  TournamentStandingModel,
} from "../modules/tournament/tournament.model";
export {
  TriviaQuestionModel,
  TriviaMediaModel,
} from "../modules/question/trivia-question.model";
