// ─── Property tests against brute-force enumeration ────────────────────────

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  Line,
  TriState,
  InferStatus,
  cluesFromCells,
} from "../src/engine/index";

type Reveal = "hide" | "show" | "noise";

interface Case {
  clue: number[];
  cells: TriState[];
}

const STATES = [TriState.Unknown, TriState.Filled, TriState.Empty] as const;

// A hidden solution supplies the clue; each cell is then hidden, shown,
// or replaced by an arbitrary value (which may make the line unsatisfiable).
const caseArb: fc.Arbitrary<Case> = fc
  .array(
    fc.tuple(
      fc.boolean(),
      fc.constantFrom<Reveal>("hide", "hide", "show", "noise"),
      fc.constantFrom(...STATES),
    ),
    { maxLength: 12 },
  )
  .map((draws) => {
    const solution = draws.map(([filled]) => (filled ? TriState.Filled : TriState.Empty));
    const cells = draws.map(([filled, reveal, noise]) => {
      if (reveal === "hide") return TriState.Unknown;
      if (reveal === "show") return filled ? TriState.Filled : TriState.Empty;
      return noise;
    });
    return { clue: cluesFromCells(solution), cells };
  });

function sameClue(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

// Every concrete filling of the line that matches the clue and the known cells
function bruteForce({ clue, cells }: Case): TriState[][] {
  const n = cells.length;
  const out: TriState[][] = [];
  for (let mask = 0; mask < 1 << n; mask++) {
    const row: TriState[] = [];
    for (let i = 0; i < n; i++) {
      row.push(mask & (1 << i) ? TriState.Filled : TriState.Empty);
    }
    if (row.some((v, i) => cells[i] !== TriState.Unknown && cells[i] !== v)) continue;
    if (sameClue(cluesFromCells(row), clue)) out.push(row);
  }
  return out;
}

function intersect(rows: TriState[][], length: number): TriState[] {
  const out: TriState[] = [];
  for (let i = 0; i < length; i++) {
    out.push(rows.every((r) => r[i] === rows[0][i]) ? rows[0][i] : TriState.Unknown);
  }
  return out;
}

describe("inference properties", () => {
  it("forces exactly the cells every consistent filling agrees on", () => {
    fc.assert(
      fc.property(caseArb, (c) => {
        const solutions = bruteForce(c);
        const line = new Line(c.clue, [...c.cells]);
        const result = line.infer();

        if (solutions.length === 0) {
          expect(result.status).toBe(InferStatus.Contradiction);
          return;
        }
        expect(result.status).toBe(InferStatus.Ok);
        expect(result.placements).toBe(solutions.length);
        expect(line.cells).toEqual(intersect(solutions, c.cells.length));
      }),
    );
  });

  it("only ever turns unknown cells into known ones", () => {
    fc.assert(
      fc.property(caseArb, (c) => {
        const before = [...c.cells];
        const line = new Line(c.clue, [...c.cells]);
        const result = line.infer();
        if (result.status !== InferStatus.Ok) return;

        line.cells.forEach((after, i) => {
          if (before[i] !== TriState.Unknown) expect(after).toBe(before[i]);
          expect(line.changedCells[i]).toBe(before[i] !== after);
        });
        expect(result.changed).toBe(line.changedCells.some((v) => v));
      }),
    );
  });

  it("reaches a fixpoint after one call", () => {
    fc.assert(
      fc.property(caseArb, (c) => {
        const line = new Line(c.clue, [...c.cells]);
        if (line.infer().status !== InferStatus.Ok) return;
        const settled = [...line.cells];

        const again = line.infer();
        expect(again.status).toBe(InferStatus.Ok);
        expect(again.status === InferStatus.Ok && again.changed).toBe(false);
        expect(line.cells).toEqual(settled);
      }),
    );
  });

  it("leaves a fully revealed line untouched", () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 16 }), (bits) => {
        const cells = bits.map((b) => (b ? TriState.Filled : TriState.Empty));
        const line = new Line(cluesFromCells(cells), [...cells]);
        expect(line.infer()).toEqual({ status: InferStatus.Ok, changed: false, placements: 1 });
        expect(line.cells).toEqual(cells);
      }),
    );
  });
});
