import { Constraint, TriState } from "./types";
import { InvalidLineError } from "./errors";

// Text notation for lines: "_" unknown, "*" filled, "." empty.
// Clues are block lengths separated by whitespace; "" or "0" is the empty clue.

const STATE_BY_CHAR = new Map<string, TriState>(
  Object.values(TriState).map((s) => [s, s]),
);

export function isTriState(value: unknown): value is TriState {
  return typeof value === "string" && STATE_BY_CHAR.has(value);
}

export function parseCells(text: string): TriState[] {
  const cells: TriState[] = [];
  for (let i = 0; i < text.length; i++) {
    const state = STATE_BY_CHAR.get(text[i]);
    if (state === undefined) {
      throw new InvalidLineError(`Unknown cell character "${text[i]}" at ${i}.`);
    }
    cells.push(state);
  }
  return cells;
}

export function formatCells(cells: readonly TriState[]): string {
  return cells.join("");
}

export function parseClue(text: string): number[] {
  const tokens = text.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 1 && tokens[0] === "0") return [];

  return tokens.map((token) => {
    if (!/^\d+$/.test(token) || Number(token) === 0) {
      throw new InvalidLineError(`Bad block length "${token}" in clue "${text}".`);
    }
    return Number(token);
  });
}

export function formatClue(constraint: Constraint): string {
  return constraint.join(" ");
}

// e.g. # clue=[1 2] cells=[_*.__*__.]
export function formatTrace(constraint: Constraint, cells: readonly TriState[]): string {
  return `# clue=[${formatClue(constraint)}] cells=[${formatCells(cells)}]`;
}
