import type { Line } from "./line";
import {
  AssignOutcome,
  Constraint,
  EngineConfig,
  InferResult,
  InferStatus,
  Placement,
  TriState,
} from "./types";
import { formatClue, formatTrace } from "./notation";

/**
 * Depth-first search over every placement of the blocks that keeps them
 * ordered, separated by at least one cell, and consistent with the known
 * cells. Each complete placement is handed to `visit` as soon as it is found.
 *
 * An empty constraint has exactly one (vacuous) placement, visited without
 * checking the line, so Filled cells surface later as a conflict.
 *
 * @returns number of placements visited
 */
export function enumeratePlacements(
  constraint: Constraint,
  cells: readonly TriState[],
  visit: (placement: Placement) => void,
): number {
  const len = cells.length;
  const count = constraint.length;
  let found = 0;

  if (count === 0) {
    visit([]);
    return 1;
  }

  function anyFilled(from: number, to: number): boolean {
    for (let j = from; j < to; j++) {
      if (cells[j] === TriState.Filled) return true;
    }
    return false;
  }

  function anyEmpty(from: number, to: number): boolean {
    for (let j = from; j < to; j++) {
      if (cells[j] === TriState.Empty) return true;
    }
    return false;
  }

  function dfs(b: number, placement: Placement): void {
    if (b === count) {
      found++;
      visit(placement);
      return;
    }

    const size = constraint[b];
    const prevEnd = b === 0 ? 0 : placement[b - 1] + constraint[b - 1];
    const start = b === 0 ? 0 : prevEnd + 1;
    const isLast = b === count - 1;

    // Cells between the previous block and this one must not be Filled.
    // The gap only grows with i, so the first Filled cell ends the scan.
    if (anyFilled(prevEnd, start)) return;

    for (let i = start; i + size <= len; i++) {
      if (i > start && cells[i - 1] === TriState.Filled) break;
      if (anyEmpty(i, i + size)) continue;
      if (isLast && anyFilled(i + size, len)) continue;
      dfs(b + 1, [...placement, i]);
    }
  }

  dfs(0, []);
  return found;
}

export function materialize(constraint: Constraint, placement: Placement, length: number): TriState[] {
  const row = new Array<TriState>(length).fill(TriState.Empty);
  placement.forEach((start, b) => {
    for (let j = start; j < start + constraint[b]; j++) row[j] = TriState.Filled;
  });
  return row;
}

// Intersect one more placement into the running estimate.
// A null accumulator means nothing has been folded yet.
export function fold(accumulator: TriState[] | null, row: readonly TriState[]): TriState[] {
  if (accumulator === null) return [...row];
  for (let i = 0; i < accumulator.length; i++) {
    if (accumulator[i] !== row[i]) accumulator[i] = TriState.Unknown;
  }
  return accumulator;
}

export function inferLine(line: Line, config: EngineConfig): InferResult {
  line.resetChanges();

  const scratch: { accumulator: TriState[] | null } = { accumulator: null };
  const placements = enumeratePlacements(line.constraint, line.cells, (placement) => {
    scratch.accumulator = fold(scratch.accumulator, materialize(line.constraint, placement, line.length));
  });

  const accumulator = scratch.accumulator;
  if (accumulator === null) {
    if (config.unsatisfiable === "ignore") {
      return finish(line, config, { status: InferStatus.Ok, changed: false, placements: 0 });
    }
    return finish(line, config, {
      status: InferStatus.Contradiction,
      cause: "unsatisfiable",
      index: null,
      reason: `No placement of clue [${formatClue(line.constraint)}] fits the known cells.`,
      placements: 0,
    });
  }

  for (let i = 0; i < accumulator.length; i++) {
    const value = accumulator[i];
    if (value === TriState.Unknown) continue;
    const current = line.cells[i];
    if (line.assign(i, value) === AssignOutcome.Conflict) {
      return finish(line, config, {
        status: InferStatus.Contradiction,
        cause: "conflict",
        index: i,
        reason: `Cell ${i} holds "${current}" but every placement gives "${value}".`,
        placements,
      });
    }
  }

  return finish(line, config, { status: InferStatus.Ok, changed: line.changed, placements });
}

function finish(line: Line, config: EngineConfig, result: InferResult): InferResult {
  if (config.debug) {
    config.log(formatTrace(line.constraint, line.cells));
    if (result.status === InferStatus.Contradiction) {
      config.log(`# contradiction: ${result.reason}`);
    }
  }
  return result;
}
