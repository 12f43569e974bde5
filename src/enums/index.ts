// src/enums/index.ts
export enum RoundState {
  Initial = "INITIAL",
  Collecting = "COLLECTING",
  Scoring = "SCORING",
  Results = "RESULTS",
  Skipped = "SKIPPED",
}

export const TERMINAL_ROUND_STATES: ReadonlySet<RoundState> = new Set([
  RoundState.Results,
  RoundState.Skipped,
]);

export function isTerminalState(state: RoundState): boolean {
  return TERMINAL_ROUND_STATES.has(state);
}

export enum RoundStage {
  Begin = "begin",
  Collect = "collect",
  Score = "score",
  Publish = "publish",
  Finalize = "finalize",
  Recovery = "recovery",
}

export enum GameErrorKind {
  NoProviderConfigured = "NO_PROVIDER_CONFIGURED",
  ExhaustedSource = "EXHAUSTED_SOURCE",
  PublishFailure = "PUBLISH_FAILURE",
  PersistenceFailure = "PERSISTENCE_FAILURE",
}
