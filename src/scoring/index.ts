export { calculateScore, isOrderedSubsequence, tokenWeight } from "./score-calculator.js";
export { SEPARATOR_WEIGHT, WORD_WEIGHT } from "./weights.js";
