/**
 * Flow estimator: rewards routes that switch sides and keep gaining height.
 */

import {
  ALTERNATION_WEIGHT,
  GOOD_FLOW_THRESHOLD,
  UPWARD_WEIGHT,
} from "../core/constants";
import {
  countDirectReversals,
  countUpwardMoves,
  moveSides,
} from "../core/geometry";
import { handSequence } from "../route/route";
import type { Route } from "../route/types";
import type { FlowEstimate } from "./types";

export function estimateFlow(route: Route): FlowEstimate {
  const sequence = handSequence(route);
  const sides = moveSides(sequence);

  const pairs = sides.length - 1;
  const alternation = pairs > 0 ? countDirectReversals(sides) / pairs : 0;
  const upward =
    sides.length > 0 ? countUpwardMoves(sequence) / sides.length : 0;
  const flowScore = ALTERNATION_WEIGHT * alternation + UPWARD_WEIGHT * upward;

  return {
    alternation,
    upward,
    flowScore,
    goodFlow: flowScore >= GOOD_FLOW_THRESHOLD,
  };
}
