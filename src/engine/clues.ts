import { Constraint, TriState } from "./types";

/** Cells the blocks need when packed to the left: sum of lengths plus one gap between neighbours. */
export function minimumLength(constraint: Constraint): number {
  if (constraint.length === 0) return 0;
  let total = constraint.length - 1;
  for (const block of constraint) total += block;
  return total;
}

// Runs of Filled cells; Unknown cells end a run just like Empty ones
export function cluesFromCells(cells: readonly TriState[]): number[] {
  const out: number[] = [];
  let run = 0;
  for (const cell of cells) {
    if (cell === TriState.Filled) {
      run++;
    } else if (run > 0) {
      out.push(run);
      run = 0;
    }
  }
  if (run > 0) out.push(run);
  return out;
}

export function isSolved(constraint: Constraint, cells: readonly TriState[]): boolean {
  if (cells.some((c) => c === TriState.Unknown)) return false;
  const actual = cluesFromCells(cells);
  return actual.length === constraint.length && actual.every((b, i) => b === constraint[i]);
}
