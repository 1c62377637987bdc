import {
  AssignOutcome,
  Constraint,
  DEFAULT_CONFIG,
  EngineConfig,
  InferResult,
  KnownState,
  TriState,
} from "./types";
import { InvalidLineError } from "./errors";
import { minimumLength } from "./clues";
import { formatClue, formatTrace, isTriState, parseCells, parseClue } from "./notation";
import { inferLine } from "./inference";

/**
 * One row or column of a puzzle together with its clue.
 *
 * `cells` is the caller's array and is refined in place by {@link Line.infer}.
 * The changed flags describe the most recent `infer()` call only.
 */
export class Line {
  readonly config: EngineConfig;
  readonly constraint: Constraint;
  readonly cells: TriState[];
  readonly changedCells: boolean[];
  changed = false;

  constructor(constraint: Constraint, cells: TriState[], config: Partial<EngineConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    // Indexed loops so holes in sparse arrays are checked as undefined
    for (let i = 0; i < constraint.length; i++) {
      const block = constraint[i];
      if (!Number.isInteger(block) || block <= 0) {
        throw new InvalidLineError(`Block ${i} has length ${block}; lengths must be positive integers.`);
      }
    }
    for (let i = 0; i < cells.length; i++) {
      if (!isTriState(cells[i])) {
        throw new InvalidLineError(`Cell ${i} is not a cell state: ${String(cells[i])}.`);
      }
    }
    const needed = minimumLength(constraint);
    if (needed > cells.length) {
      throw new InvalidLineError(
        `Clue [${formatClue(constraint)}] needs ${needed} cells but the line has ${cells.length}.`,
      );
    }

    this.constraint = Object.freeze([...constraint]);
    this.cells = cells;
    this.changedCells = new Array<boolean>(cells.length).fill(false);
  }

  /** Build a line from text, e.g. `Line.parse("3 2", "______")`. */
  static parse(clue: string, cells: string, config: Partial<EngineConfig> = {}): Line {
    return new Line(parseClue(clue), parseCells(cells), config);
  }

  get length(): number {
    return this.cells.length;
  }

  resetChanges(): void {
    this.changedCells.fill(false);
    this.changed = false;
  }

  // Monotonic write: Unknown may become known, a known value never flips
  assign(index: number, value: KnownState): AssignOutcome {
    if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
      throw new InvalidLineError(`Cell index ${index} is outside 0..${this.cells.length - 1}.`);
    }
    const cell = this.cells[index];
    if (cell === value) return AssignOutcome.Unchanged;
    if (cell !== TriState.Unknown) return AssignOutcome.Conflict;

    this.cells[index] = value;
    this.changedCells[index] = true;
    this.changed = true;
    return AssignOutcome.Changed;
  }

  // `cells` must keep the length it had at construction
  infer(): InferResult {
    if (this.cells.length !== this.changedCells.length) {
      throw new InvalidLineError(
        `Line was built with ${this.changedCells.length} cells but now has ${this.cells.length}.`,
      );
    }
    return inferLine(this, this.config);
  }

  toString(): string {
    return formatTrace(this.constraint, this.cells);
  }
}
