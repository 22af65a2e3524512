export { TurnEngine, CHALLENGE_PENALTY, FAILED_CHALLENGE_PENALTY, type GameEventListener, type RunOptions } from "./turn-engine";
export { createGame, type GameSetup, type SeatSetup } from "./setup";
export { GameState } from "./game-state";
export { Player } from "./player";
export type { DecisionPolicy } from "./policy";
export { createPlayerView, type PlayerView, type SeatView } from "./state-filter";
export { chooseColorAuto } from "./color-choice";
export { drawMove, invalidMove, playMove } from "./moves";
export { GameOverError, PreconditionError } from "./errors";
export { SeededRng, createRng, type RandomSource } from "./prng";
