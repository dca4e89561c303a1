import { LayoutError, OutOfBoundsError } from "@routesetter/contracts";
import {
  BOARD_SIZE,
  type EmptyCell,
  type FootHold,
  type HandHold,
  type Hold,
  isFootHold,
  isHandHold,
  isOnBoard,
} from "./types";

function cellIndex(col: number, row: number): number {
  return (row - 1) * BOARD_SIZE + (col - 1);
}

/**
 * Immutable lookup table of every cell on the 35×35 board.
 *
 * Cells the layout does not mention are `none`. Built once at startup and
 * shared read-only by any number of generation requests.
 */
export class Board {
  readonly size = BOARD_SIZE;
  private readonly cells: readonly Hold[];
  private readonly hands: readonly HandHold[];
  private readonly feet: readonly FootHold[];

  private constructor(cells: Hold[]) {
    this.cells = Object.freeze(cells);
    this.hands = Object.freeze(cells.filter(isHandHold));
    this.feet = Object.freeze(cells.filter(isFootHold));
    Object.freeze(this);
  }

  /**
   * Build a board from hold values.
   *
   * @throws {OutOfBoundsError} If a hold lies outside the grid
   * @throws {LayoutError} On a duplicate position or a hand hold difficulty
   * outside 0..5 (the entry number is reported as the line)
   */
  static fromHolds(holds: readonly Hold[]): Board {
    const cells: (Hold | undefined)[] = new Array(BOARD_SIZE * BOARD_SIZE);

    holds.forEach((hold, index) => {
      if (!isOnBoard(hold.col, hold.row)) {
        throw new OutOfBoundsError(hold.col, hold.row);
      }
      if (
        hold.kind === "hand" &&
        !(Number.isInteger(hold.baseDifficulty) &&
          hold.baseDifficulty >= 0 &&
          hold.baseDifficulty <= 5)
      ) {
        throw new LayoutError(
          `base difficulty ${hold.baseDifficulty} is outside 0..5`,
          index + 1,
        );
      }
      const i = cellIndex(hold.col, hold.row);
      if (cells[i] !== undefined) {
        throw new LayoutError(
          `duplicate position (${hold.col}, ${hold.row})`,
          index + 1,
        );
      }
      cells[i] = Object.freeze({ ...hold });
    });

    const filled: Hold[] = [];
    for (let row = 1; row <= BOARD_SIZE; row++) {
      for (let col = 1; col <= BOARD_SIZE; col++) {
        const empty: EmptyCell = { col, row, kind: "none" };
        filled.push(cells[cellIndex(col, row)] ?? Object.freeze(empty));
      }
    }
    return new Board(filled);
  }

  /**
   * Hold at a position.
   * @throws {OutOfBoundsError} Outside 1..35 on either axis
   */
  lookup(col: number, row: number): Hold {
    if (!isOnBoard(col, row)) {
      throw new OutOfBoundsError(col, row);
    }
    const hold = this.cells[cellIndex(col, row)];
    if (hold === undefined) {
      throw new OutOfBoundsError(col, row);
    }
    return hold;
  }

  /**
   * All hand holds, bottom row first then by column.
   */
  handHolds(): readonly HandHold[] {
    return this.hands;
  }

  /**
   * All foot holds, bottom row first then by column.
   */
  footHolds(): readonly FootHold[] {
    return this.feet;
  }

  /**
   * Every cell, bottom row first then by column.
   */
  allCells(): readonly Hold[] {
    return this.cells;
  }
}
