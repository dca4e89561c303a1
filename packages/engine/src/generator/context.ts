/**
 * State shared by the phases of a single generation attempt.
 */

import type { GenerationParameters, RandomSource } from "@routesetter/contracts";
import type { Board } from "../board/board";
import { type FootHold, type HandHold, positionKey } from "../board/types";
import type { TraceCollector } from "../pipeline/trace";
import type { PlacedHold } from "../route/types";

export interface GenerationContext {
  readonly board: Board;
  readonly params: GenerationParameters;
  readonly random: RandomSource;
  readonly trace: TraceCollector;
  /** Positions already on the route, keyed by {@link positionKey} */
  readonly used: Set<string>;
}

/**
 * Placed holds of one phase plus the hand hold the next phase continues from.
 */
export interface PhaseOutput {
  readonly placed: readonly PlacedHold[];
  readonly top: HandHold;
}

export function createContext(
  board: Board,
  params: GenerationParameters,
  random: RandomSource,
  trace: TraceCollector,
): GenerationContext {
  return { board, params, random, trace, used: new Set() };
}

export function isUsed(ctx: GenerationContext, hold: HandHold | FootHold): boolean {
  return ctx.used.has(positionKey(hold));
}

export function markUsed(ctx: GenerationContext, hold: HandHold | FootHold): void {
  ctx.used.add(positionKey(hold));
}

/**
 * Order holds bottom to top, then left to right.
 */
export function byRowThenCol(a: HandHold, b: HandHold): number {
  return a.row - b.row || a.col - b.col;
}

export function describeHold(hold: HandHold | FootHold): string {
  return `(${hold.col}, ${hold.row})`;
}
