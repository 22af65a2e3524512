export { Deck } from "./deck";
export { countCards, sameCardMultiset, standardDeck } from "./presets";
