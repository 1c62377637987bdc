// Cell values double as the characters used by the trace notation
export enum TriState {
  Unknown = "_",
  Filled = "*",
  Empty = ".",
}

export type KnownState = TriState.Filled | TriState.Empty;

// Block lengths, left to right (or top to bottom)
export type Constraint = readonly number[];

// Start index of each block, in constraint order
export type Placement = readonly number[];

export enum InferStatus {
  Ok = "ok",
  Contradiction = "contradiction",
}

export enum AssignOutcome {
  Unchanged = "unchanged",
  Changed = "changed",
  Conflict = "conflict",
}

export type ContradictionCause = "conflict" | "unsatisfiable";

export type UnsatisfiablePolicy = "contradiction" | "ignore";

export interface InferOk {
  status: InferStatus.Ok;
  changed: boolean;
  placements: number;
}

export interface InferContradiction {
  status: InferStatus.Contradiction;
  cause: ContradictionCause;
  index: number | null; // conflicting cell, null when no placement exists
  reason: string;
  placements: number;
}

export type InferResult = InferOk | InferContradiction;

export interface EngineConfig {
  debug: boolean;
  unsatisfiable: UnsatisfiablePolicy;
  log: (message: string) => void;
}

/** Default config */
export const DEFAULT_CONFIG: EngineConfig = {
  debug: false,
  unsatisfiable: "contradiction",
  log: (message) => console.debug(message),
};
