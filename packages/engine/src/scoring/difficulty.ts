/**
 * Difficulty estimator.
 *
 * Four terms on a common 0-5 scale, weighted and summed. Only the hand
 * sequence counts; foot holds never change the score.
 */

import type { HandHold } from "../board/types";
import {
  ANGLE_OFFSET,
  ANGLE_SCALE,
  ANGLE_WEIGHT,
  DISTANCE_REFERENCE_SPAN,
  DISTANCE_WEIGHT,
  FLOW_PENALTY_WEIGHT,
  HARD_THRESHOLD,
  HOLD_DIFFICULTY_WEIGHT,
  INTERMEDIATE_THRESHOLD,
  NON_UPWARD_PENALTY_SHARE,
  OVERHANG_ADJUSTMENT,
  OVERHANG_ROW_MAX,
  SLAB_ADJUSTMENT,
  SLAB_ROW_MIN,
  TERM_SCALE,
  VERY_HARD_THRESHOLD,
  ZIGZAG_PENALTY_SHARE,
} from "../core/constants";
import {
  countDirectReversals,
  countUpwardMoves,
  distance,
  moveSides,
} from "../core/geometry";
import { handSequence } from "../route/route";
import type { Route } from "../route/types";
import type { DifficultyEstimate, DifficultyLabel } from "./types";

const ZERO_ESTIMATE: DifficultyEstimate = {
  score: 0,
  label: "Easy",
  breakdown: { hold: 0, distance: 0, angle: 0, flowPenalty: 0 },
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Wall angle adjustment for a row: overhang at the bottom, slab at the top.
 */
export function angleAdjustment(row: number): number {
  if (row <= OVERHANG_ROW_MAX) return OVERHANG_ADJUSTMENT;
  if (row >= SLAB_ROW_MIN) return SLAB_ADJUSTMENT;
  return 0;
}

export function difficultyLabel(score: number): DifficultyLabel {
  if (score < INTERMEDIATE_THRESHOLD) return "Easy";
  if (score < HARD_THRESHOLD) return "Intermediate";
  if (score < VERY_HARD_THRESHOLD) return "Hard";
  return "VeryHard";
}

/**
 * Fraction of consecutive move pairs that are direct reversals, and of moves
 * that do not gain height.
 */
export function flowPenaltyFractions(sequence: readonly HandHold[]): {
  zigzag: number;
  nonUpward: number;
} {
  const sides = moveSides(sequence);
  const pairs = sides.length - 1;
  const nonUpward = sides.length - countUpwardMoves(sequence);
  return {
    zigzag: pairs > 0 ? countDirectReversals(sides) / pairs : 0,
    nonUpward: sides.length > 0 ? nonUpward / sides.length : 0,
  };
}

export function estimateDifficulty(route: Route): DifficultyEstimate {
  const sequence = handSequence(route);
  if (sequence.length < 2) return ZERO_ESTIMATE;

  const holdTerm = mean(sequence.map((hold) => hold.baseDifficulty));

  const moveDistances: number[] = [];
  for (let i = 1; i < sequence.length; i++) {
    const from = sequence[i - 1];
    const to = sequence[i];
    if (from && to) moveDistances.push(distance(from, to));
  }
  const distanceTerm =
    clamp(mean(moveDistances) / DISTANCE_REFERENCE_SPAN, 0, 1) * TERM_SCALE;

  const meanAdjustment = mean(sequence.map((hold) => angleAdjustment(hold.row)));
  const angleTerm = clamp(
    (meanAdjustment + ANGLE_OFFSET) * ANGLE_SCALE,
    0,
    TERM_SCALE,
  );

  const { zigzag, nonUpward } = flowPenaltyFractions(sequence);
  const flowPenaltyTerm =
    (ZIGZAG_PENALTY_SHARE * zigzag + NON_UPWARD_PENALTY_SHARE * nonUpward) *
    TERM_SCALE;

  const breakdown = {
    hold: holdTerm * HOLD_DIFFICULTY_WEIGHT,
    distance: distanceTerm * DISTANCE_WEIGHT,
    angle: angleTerm * ANGLE_WEIGHT,
    flowPenalty: flowPenaltyTerm * FLOW_PENALTY_WEIGHT,
  };
  const score =
    breakdown.hold + breakdown.distance + breakdown.angle + breakdown.flowPenalty;

  return { score, label: difficultyLabel(score), breakdown };
}
