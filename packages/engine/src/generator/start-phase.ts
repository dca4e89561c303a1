/**
 * Start phase: one or two start hands in the start band, each with the
 * nearest foot holds below it.
 */

import { Err, GenerationError, Ok, type Result } from "@routesetter/contracts";
import type { FootHold, HandHold } from "../board/types";
import {
  START_FEET_PER_HAND,
  START_ROW_MAX,
  START_ROW_MIN,
} from "../core/constants";
import { distance } from "../core/geometry";
import type { PlacedHold } from "../route/types";
import {
  describeHold,
  type GenerationContext,
  isUsed,
  markUsed,
  type PhaseOutput,
} from "./context";
import { pickHoldPair } from "./pair";

/**
 * Up to {@link START_FEET_PER_HAND} unused foot holds below `hand`, nearest
 * first. Ties go to the lower row, then the lower column.
 */
export function nearestFeetBelow(
  ctx: GenerationContext,
  hand: HandHold,
): FootHold[] {
  return ctx.board
    .footHolds()
    .filter((foot) => foot.row < hand.row && !isUsed(ctx, foot))
    .map((foot) => ({ foot, d: distance(hand, foot) }))
    .sort((a, b) => a.d - b.d || a.foot.row - b.foot.row || a.foot.col - b.foot.col)
    .slice(0, START_FEET_PER_HAND)
    .map(({ foot }) => foot);
}

export function placeStartHolds(
  ctx: GenerationContext,
): Result<PhaseOutput, GenerationError> {
  const [head, ...rest] = ctx.board
    .handHolds()
    .filter((hold) => hold.row >= START_ROW_MIN && hold.row <= START_ROW_MAX);

  if (head === undefined) {
    return Err(
      new GenerationError(
        "start",
        `no hand holds in rows ${START_ROW_MIN}-${START_ROW_MAX}`,
      ),
    );
  }
  const band: [HandHold, ...HandHold[]] = [head, ...rest];

  // A lone hold in the band can only be a single start
  const count = band.length > 1 ? ctx.random.range(1, 2) : 1;
  let hands: [HandHold] | [HandHold, HandHold];
  if (count === 1) {
    const hold = ctx.random.choice(band);
    ctx.trace.decision(
      "start",
      "Single start hold",
      band.length,
      describeHold(hold),
      "uniform pick from the start band",
    );
    hands = [hold];
  } else {
    const pair = pickHoldPair(ctx, "start", band);
    if (!pair.success) return Err(pair.error);
    hands = pair.value;
  }

  const placed: PlacedHold[] = [];
  for (const hand of hands) {
    markUsed(ctx, hand);
    placed.push({ role: "start", hold: hand });
    for (const foot of nearestFeetBelow(ctx, hand)) {
      markUsed(ctx, foot);
      placed.push({ role: "foot", hold: foot });
    }
  }

  const top = hands.length === 2 ? hands[1] : hands[0];
  return Ok({ placed, top });
}
