/**
 * Board hold types.
 * All values are immutable; a Board owns them for the whole process.
 */

/** Edge length of the square hold grid */
export const BOARD_SIZE = 35;

export type HoldKind = "hand" | "foot" | "none";

export type HoldDirection = "up" | "right" | "down" | "left";

export const GRIP_TYPES = [
  "jug",
  "edge",
  "crimp",
  "sloper",
  "pinch",
  "sidepull",
  "undercut",
] as const;

export type GripType = (typeof GRIP_TYPES)[number];

/**
 * 1-based board coordinate; row 1 is the bottom of the board.
 */
export interface GridPosition {
  readonly col: number;
  readonly row: number;
}

export interface HandHold extends GridPosition {
  readonly kind: "hand";
  readonly direction: HoldDirection;
  readonly gripType: GripType;
  /** 0 (jug) .. 5 (hardest) */
  readonly baseDifficulty: number;
}

export interface FootHold extends GridPosition {
  readonly kind: "foot";
}

export interface EmptyCell extends GridPosition {
  readonly kind: "none";
}

export type Hold = HandHold | FootHold | EmptyCell;

export function isHandHold(hold: Hold): hold is HandHold {
  return hold.kind === "hand";
}

export function isFootHold(hold: Hold): hold is FootHold {
  return hold.kind === "foot";
}

export function isOnBoard(col: number, row: number): boolean {
  return (
    Number.isInteger(col) &&
    Number.isInteger(row) &&
    col >= 1 &&
    col <= BOARD_SIZE &&
    row >= 1 &&
    row <= BOARD_SIZE
  );
}

export function positionKey(position: GridPosition): string {
  return `${position.col},${position.row}`;
}
