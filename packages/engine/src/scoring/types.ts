export type DifficultyLabel = "Easy" | "Intermediate" | "Hard" | "VeryHard";

/**
 * Weighted contribution of each difficulty term. They sum to the score.
 */
export interface DifficultyBreakdown {
  readonly hold: number;
  readonly distance: number;
  readonly angle: number;
  readonly flowPenalty: number;
}

export interface DifficultyEstimate {
  readonly score: number;
  readonly label: DifficultyLabel;
  readonly breakdown: DifficultyBreakdown;
}

export interface FlowEstimate {
  /** Share of consecutive move pairs that switch sides directly (0..1) */
  readonly alternation: number;
  /** Share of moves that gain height (0..1) */
  readonly upward: number;
  readonly flowScore: number;
  readonly goodFlow: boolean;
}

export interface ScoreResult {
  readonly difficultyScore: number;
  readonly difficultyLabel: DifficultyLabel;
  readonly flowScore: number;
  readonly goodFlow: boolean;
}
