export { Line } from "./line";
export { InvalidLineError } from "./errors";
export {
  enumeratePlacements,
  materialize,
  fold,
  inferLine,
} from "./inference";
export {
  isTriState,
  parseCells,
  formatCells,
  parseClue,
  formatClue,
  formatTrace,
} from "./notation";
export { cluesFromCells, minimumLength, isSolved } from "./clues";
export type {
  Constraint,
  Placement,
  KnownState,
  InferOk,
  InferContradiction,
  InferResult,
  ContradictionCause,
  UnsatisfiablePolicy,
  EngineConfig,
} from "./types";
export { TriState, InferStatus, AssignOutcome, DEFAULT_CONFIG } from "./types";
