/**
 * ASCII Board Renderer
 *
 * Renders a board and a route on it as text, row 35 on top.
 *
 * @example
 * ```typescript
 * const result = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, { seed: 7 });
 * if (result.success) {
 *   printRoute(board, result.route, { useColors: true });
 * }
 * ```
 */

import type { Board } from "../board/board";
import { BOARD_SIZE, type Hold, positionKey } from "../board/types";
import type { Route } from "../route/types";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character mapping for route roles and bare cells
 */
export interface AsciiCharset {
  readonly start: string;
  readonly hand: string;
  readonly foot: string;
  readonly finish: string;
  readonly unusedHand: string;
  readonly unusedFoot: string;
  readonly empty: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  start: "▲",
  hand: "●",
  foot: "■",
  finish: "★",
  unusedHand: "○",
  unusedFoot: "□",
  empty: "·",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  start: "S",
  hand: "H",
  foot: "F",
  finish: "T",
  unusedHand: "o",
  unusedFoot: "_",
  empty: ".",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Draw board holds that are not on the route */
  readonly showUnusedHolds?: boolean;
  /** Row numbers on the left, column numbers below */
  readonly showCoordinates?: boolean;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

type CellRole = keyof AsciiCharset;

const ROLE_COLORS: Record<CellRole, readonly string[]> = {
  start: [ANSI.bold, ANSI.green],
  hand: [ANSI.bold, ANSI.cyan],
  foot: [ANSI.yellow],
  finish: [ANSI.bold, ANSI.red],
  unusedHand: [ANSI.white],
  unusedFoot: [ANSI.dim, ANSI.yellow],
  empty: [ANSI.dim, ANSI.white],
};

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

function bareRole(hold: Hold, showUnusedHolds: boolean): CellRole {
  if (!showUnusedHolds) return "empty";
  switch (hold.kind) {
    case "hand":
      return "unusedHand";
    case "foot":
      return "unusedFoot";
    case "none":
      return "empty";
  }
}

/**
 * Render a route on its board, one text line per board row.
 */
export function renderRouteAscii(
  board: Board,
  route: Route,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    showUnusedHolds = true,
    showCoordinates = false,
    useColors = false,
  } = options;

  const roles = new Map<string, CellRole>();
  for (const placed of route.holds) {
    roles.set(positionKey(placed.hold), placed.role);
  }

  const lines: string[] = [];
  for (let row = BOARD_SIZE; row >= 1; row--) {
    const cells: string[] = [];
    for (let col = 1; col <= BOARD_SIZE; col++) {
      const hold = board.lookup(col, row);
      const role = roles.get(positionKey(hold)) ?? bareRole(hold, showUnusedHolds);
      const char = charset[role];
      cells.push(useColors ? colorize(char, ...ROLE_COLORS[role]) : char);
    }
    const line = cells.join(" ");
    lines.push(showCoordinates ? `${row.toString().padStart(2)} ${line}` : line);
  }

  if (showCoordinates) {
    // Column labels every 5 columns, aligned with the cell under them
    let labels = "   ";
    for (let col = 1; col <= BOARD_SIZE; col++) {
      const label = col === 1 || col % 5 === 0 ? col.toString() : "";
      labels += label.padEnd(2);
    }
    lines.push(labels.trimEnd());
  }

  return lines.join("\n");
}

/**
 * Print a route to the console
 */
export function printRoute(
  board: Board,
  route: Route,
  options: RenderOptions = {},
): void {
  console.log(renderRouteAscii(board, route, options));
}
