export type { ActionRank, Card, Color, NumberRank, PlayableColor, Rank, WildRank } from "./card";
export { ACTION_RANKS, ALL_RANKS, NUMBER_RANKS, PLAYABLE_COLORS, WILD_RANKS } from "./card";
export type { Move, MoveKind } from "./move";
export type {
  Direction,
  DrawReason,
  GameEvent,
  GameEventBody,
  GameEventType,
  HandCount,
  InitialEffect,
  PlayRejection,
} from "./events";
export type { GameConfig, PolicyKind, SeatConfig } from "./config";
