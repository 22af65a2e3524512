// ─── @no-mercy/cli ─────────────────────────────────────────────────
// Console front end: config loading, the interactive seat and the
// event narrator. The executable entry point is main.ts.

export {
  DEFAULT_PLAYER_COUNT,
  GameConfigError,
  defaultSeats,
  loadConfigFile,
  parseConfig,
  resolveConfig,
  type ConfigFlags,
} from "./config/load-config";
export { formatEvent, formatOpponents } from "./console/event-formatter";
export { HumanPolicy, describeView, parseColor } from "./console/human-policy";
export { ConsolePresenter, type PresenterOptions } from "./console/presenter";
export { InputClosedError, ReadlinePrompter, type Prompter } from "./console/prompter";
export { createSeats, hasHumanSeat } from "./seats";
