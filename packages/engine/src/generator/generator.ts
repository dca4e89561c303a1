import type {
  GenerationError,
  GenerationPhase,
  Result,
} from "@routesetter/contracts";
import { createRoute } from "../route/route";
import type { Route } from "../route/types";
import type { GenerationContext, PhaseOutput } from "./context";
import { placeFinishHolds } from "./finish-phase";
import { placeMiddleMoves } from "./middle-phase";
import { placeStartHolds } from "./start-phase";

function timed(
  ctx: GenerationContext,
  phase: GenerationPhase,
  run: () => Result<PhaseOutput, GenerationError>,
): Result<PhaseOutput, GenerationError> {
  const startTime = performance.now();
  ctx.trace.start(phase);
  const result = run();
  if (!result.success) {
    ctx.trace.warning(phase, result.error.message);
  }
  ctx.trace.end(phase, performance.now() - startTime);
  return result;
}

/**
 * Run Start, Middle and Finish against a fresh context.
 *
 * Stops at the first failing phase; a partial route is never returned.
 */
export function buildRoute(
  ctx: GenerationContext,
  seed?: number,
): Result<Route, GenerationError> {
  return timed(ctx, "start", () => placeStartHolds(ctx)).flatMap((start) =>
    timed(ctx, "middle", () => placeMiddleMoves(ctx, start.top)).flatMap(
      (middle) =>
        timed(ctx, "finish", () => placeFinishHolds(ctx, middle.top)).map(
          (finish) =>
            createRoute(
              [...start.placed, ...middle.placed, ...finish.placed],
              seed,
            ),
        ),
    ),
  );
}
