/**
 * Middle phase: a random walk of hand moves from the top start hold, with an
 * occasional foot hold next to each move.
 */

import { Err, GenerationError, Ok, type Result } from "@routesetter/contracts";
import type { FootHold, HandHold } from "../board/types";
import {
  FOOT_ATTACH_PROBABILITY,
  FOOT_RADIUS,
  MIDDLE_ROW_LIMIT,
} from "../core/constants";
import { distance, isReachable, isUpward } from "../core/geometry";
import type { PlacedHold } from "../route/types";
import {
  describeHold,
  type GenerationContext,
  isUsed,
  markUsed,
  type PhaseOutput,
} from "./context";

/**
 * Unused hand holds below the top rows that a move from `current` may land on.
 */
export function moveCandidates(
  ctx: GenerationContext,
  current: HandHold,
): HandHold[] {
  const { minReach, maxReach, allowDownwardOrSideways } = ctx.params;
  return ctx.board
    .handHolds()
    .filter(
      (hold) =>
        hold.row < MIDDLE_ROW_LIMIT &&
        !isUsed(ctx, hold) &&
        isReachable(current, hold, minReach, maxReach) &&
        (allowDownwardOrSideways || isUpward(current, hold)),
    );
}

/**
 * Unused foot holds at or below `hand` within {@link FOOT_RADIUS}.
 */
export function footCandidates(
  ctx: GenerationContext,
  hand: HandHold,
): FootHold[] {
  return ctx.board
    .footHolds()
    .filter(
      (foot) =>
        !isUsed(ctx, foot) &&
        foot.row <= hand.row &&
        distance(hand, foot) <= FOOT_RADIUS,
    );
}

export function placeMiddleMoves(
  ctx: GenerationContext,
  from: HandHold,
): Result<PhaseOutput, GenerationError> {
  const { minMoves, maxMoves } = ctx.params;
  const moves = ctx.random.range(minMoves, maxMoves);
  const placed: PlacedHold[] = [];
  let current = from;

  ctx.trace.decision(
    "middle",
    "Move count",
    maxMoves - minMoves + 1,
    moves,
    `uniform in [${minMoves}, ${maxMoves}]`,
  );

  for (let move = 1; move <= moves; move++) {
    const pool = moveCandidates(ctx, current);
    const next = ctx.random.choice(pool);
    if (next === undefined) {
      return Err(
        new GenerationError(
          "middle",
          `no reachable hold for move ${move} of ${moves} from ${describeHold(current)}`,
          { move, moves, from: { col: current.col, row: current.row } },
        ),
      );
    }

    ctx.trace.decision(
      "middle",
      `Move ${move}`,
      pool.length,
      describeHold(next),
      "uniform pick among reachable holds",
    );
    markUsed(ctx, next);
    placed.push({ role: "hand", hold: next });
    current = next;

    if (ctx.random.probability(FOOT_ATTACH_PROBABILITY)) {
      const foot = ctx.random.choice(footCandidates(ctx, next));
      if (foot !== undefined) {
        markUsed(ctx, foot);
        placed.push({ role: "foot", hold: foot });
      }
    }
  }

  return Ok({ placed, top: current });
}
