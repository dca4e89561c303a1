import { Err, GenerationError, Ok, type Result } from "@routesetter/contracts";
import type { HandHold } from "../board/types";
import { isReachable } from "../core/geometry";
import { byRowThenCol, describeHold, type GenerationContext } from "./context";

/**
 * Every pair of distinct holds within reach of each other, lower hold first.
 *
 * Upward-only routes also need the two on different rows.
 */
export function holdPairs(
  ctx: GenerationContext,
  candidates: readonly HandHold[],
): [HandHold, HandHold][] {
  const { minReach, maxReach, allowDownwardOrSideways } = ctx.params;
  const pairs: [HandHold, HandHold][] = [];

  candidates.forEach((first, index) => {
    for (const second of candidates.slice(index + 1)) {
      if (!isReachable(first, second, minReach, maxReach)) continue;
      if (!allowDownwardOrSideways && first.row === second.row) continue;
      pairs.push(
        byRowThenCol(first, second) <= 0 ? [first, second] : [second, first],
      );
    }
  });
  return pairs;
}

/**
 * Uniform pick among the {@link holdPairs} of `candidates`.
 */
export function pickHoldPair(
  ctx: GenerationContext,
  phase: "start" | "finish",
  candidates: readonly HandHold[],
): Result<[HandHold, HandHold], GenerationError> {
  const pairs = holdPairs(ctx, candidates);
  const pair = ctx.random.choice(pairs);

  if (pair === undefined) {
    return Err(
      new GenerationError(
        phase,
        `no reachable ${phase} pair among ${candidates.length} holds`,
        { candidates: candidates.length },
      ),
    );
  }

  ctx.trace.decision(
    phase,
    phase === "start" ? "Start pair" : "Finish pair",
    pairs.length,
    pair.map(describeHold),
    "uniform pick among reachable pairs",
  );
  return Ok(pair);
}
