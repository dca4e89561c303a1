import type { Route } from "../route/types";
import { estimateDifficulty } from "./difficulty";
import { estimateFlow } from "./flow";
import type { DifficultyLabel, ScoreResult } from "./types";

export {
  angleAdjustment,
  difficultyLabel,
  estimateDifficulty,
  flowPenaltyFractions,
} from "./difficulty";
export { estimateFlow } from "./flow";
export type * from "./types";

const LABEL_TEXT: Record<DifficultyLabel, string> = {
  Easy: "Easy",
  Intermediate: "Intermediate",
  Hard: "Hard",
  VeryHard: "Very Hard",
};

/**
 * Difficulty and flow of a route. Pure: the same route always scores the same.
 */
export function scoreRoute(route: Route): ScoreResult {
  const difficulty = estimateDifficulty(route);
  const flow = estimateFlow(route);
  return {
    difficultyScore: difficulty.score,
    difficultyLabel: difficulty.label,
    flowScore: flow.flowScore,
    goodFlow: flow.goodFlow,
  };
}

/**
 * Display lines for a score, e.g. `Difficulty: Easy (Score: 0.79)` followed by
 * `Good Flow` when the route flows well.
 */
export function formatScore(score: ScoreResult): string[] {
  const lines = [
    `Difficulty: ${LABEL_TEXT[score.difficultyLabel]} (Score: ${score.difficultyScore.toFixed(2)})`,
  ];
  if (score.goodFlow) lines.push("Good Flow");
  return lines;
}
