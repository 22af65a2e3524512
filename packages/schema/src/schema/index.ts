export {
  DECK_SIZE,
  DEFAULT_HAND_SIZE,
  formatIssues,
  GameConfigSchema,
  MAX_HAND_SIZE,
  MAX_PLAYERS,
  MIN_PLAYERS,
  parseGameConfig,
  safeParseGameConfig,
  type ParsedGameConfig,
} from "./validation";
