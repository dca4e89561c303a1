/**
 * Finish phase: one or two finish holds above the last middle move.
 */

import { Err, GenerationError, Ok, type Result } from "@routesetter/contracts";
import type { HandHold } from "../board/types";
import { isReachable } from "../core/geometry";
import {
  describeHold,
  type GenerationContext,
  isUsed,
  markUsed,
  type PhaseOutput,
} from "./context";
import { pickHoldPair } from "./pair";

export function placeFinishHolds(
  ctx: GenerationContext,
  from: HandHold,
): Result<PhaseOutput, GenerationError> {
  const { minReach, maxReach, allowTwoFinishes } = ctx.params;
  const [head, ...rest] = ctx.board
    .handHolds()
    .filter(
      (hold) =>
        hold.row > from.row &&
        !isUsed(ctx, hold) &&
        isReachable(from, hold, minReach, maxReach),
    );

  if (head === undefined) {
    return Err(
      new GenerationError(
        "finish",
        `no reachable hold above ${describeHold(from)}`,
        { from: { col: from.col, row: from.row } },
      ),
    );
  }
  const candidates: [HandHold, ...HandHold[]] = [head, ...rest];

  const count =
    allowTwoFinishes && candidates.length > 1 ? ctx.random.range(1, 2) : 1;
  let finishes: [HandHold] | [HandHold, HandHold];
  if (count === 1) {
    const hold = ctx.random.choice(candidates);
    ctx.trace.decision(
      "finish",
      "Single finish hold",
      candidates.length,
      describeHold(hold),
      "uniform pick above the last move",
    );
    finishes = [hold];
  } else {
    const pair = pickHoldPair(ctx, "finish", candidates);
    if (!pair.success) return Err(pair.error);
    finishes = pair.value;
  }

  for (const hold of finishes) markUsed(ctx, hold);
  return Ok({
    placed: finishes.map((hold) => ({ role: "finish" as const, hold })),
    top: finishes.length === 2 ? finishes[1] : finishes[0],
  });
}
