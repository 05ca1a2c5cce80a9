export * from "./types.js";
export { ScoreBoard } from "./ScoreBoard.js";
export { PeriodGenreClassifier } from "./PeriodGenreClassifier.js";
