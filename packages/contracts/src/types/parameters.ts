/**
 * Parameters for one generation request.
 *
 * Passed by value into the generator; nothing in the engine mutates them.
 */
export interface GenerationParameters {
  /** Shortest allowed Euclidean distance between consecutive hand holds */
  readonly minReach: number;
  /** Longest allowed Euclidean distance between consecutive hand holds */
  readonly maxReach: number;
  /** Fewest middle hand moves */
  readonly minMoves: number;
  /** Most middle hand moves */
  readonly maxMoves: number;
  /** Lift the strictly-upward progression rule */
  readonly allowDownwardOrSideways: boolean;
  /** Allow a second finish hold */
  readonly allowTwoFinishes: boolean;
}

/** Lower bound shared by the reach and move sliders */
export const PARAMETER_MIN = 2;

/** Upper bound shared by the reach and move sliders */
export const PARAMETER_MAX = 20;
