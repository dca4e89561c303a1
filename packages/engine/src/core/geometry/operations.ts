/**
 * Reach and direction predicates - pure functions shared by the generator and
 * both estimators, so "what generation permits" and "what scoring measures"
 * come from the same code.
 */

import type { GridPosition } from "../../board/types";

export type HorizontalSide = "left" | "right" | "neutral";

/**
 * Euclidean distance between two grid positions
 */
export function distance(a: GridPosition, b: GridPosition): number {
  const dx = a.col - b.col;
  const dy = a.row - b.row;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * True iff `minReach <= distance(a, b) <= maxReach` (both ends inclusive)
 */
export function isReachable(
  a: GridPosition,
  b: GridPosition,
  minReach: number,
  maxReach: number,
): boolean {
  const d = distance(a, b);
  return d >= minReach && d <= maxReach;
}

/**
 * True iff `b` sits on a strictly higher row than `a`
 */
export function isUpward(a: GridPosition, b: GridPosition): boolean {
  return b.row > a.row;
}

/**
 * Side of the move from `a` to `b`: sign of `b.col - a.col`
 */
export function horizontalSide(a: GridPosition, b: GridPosition): HorizontalSide {
  if (b.col < a.col) return "left";
  if (b.col > a.col) return "right";
  return "neutral";
}

/**
 * Two consecutive moves that swap sides directly. A neutral move on either
 * side never counts.
 */
export function isDirectReversal(
  first: HorizontalSide,
  second: HorizontalSide,
): boolean {
  return first !== "neutral" && second !== "neutral" && first !== second;
}

/**
 * Sides of each consecutive move along a sequence of positions
 */
export function moveSides(sequence: readonly GridPosition[]): HorizontalSide[] {
  const sides: HorizontalSide[] = [];
  for (let i = 1; i < sequence.length; i++) {
    const from = sequence[i - 1];
    const to = sequence[i];
    if (from && to) sides.push(horizontalSide(from, to));
  }
  return sides;
}

/**
 * Consecutive move pairs along `sides` that are direct reversals
 */
export function countDirectReversals(sides: readonly HorizontalSide[]): number {
  let count = 0;
  for (let i = 1; i < sides.length; i++) {
    const first = sides[i - 1];
    const second = sides[i];
    if (first && second && isDirectReversal(first, second)) count++;
  }
  return count;
}

/**
 * Consecutive moves along a sequence of positions that gain height
 */
export function countUpwardMoves(sequence: readonly GridPosition[]): number {
  let count = 0;
  for (let i = 1; i < sequence.length; i++) {
    const from = sequence[i - 1];
    const to = sequence[i];
    if (from && to && isUpward(from, to)) count++;
  }
  return count;
}
