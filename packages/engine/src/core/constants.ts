/**
 * Core Constants
 *
 * Tunable numbers for route generation and scoring.
 */

// =============================================================================
// GENERATION
// =============================================================================

/** Lowest row a start hold may sit on */
export const START_ROW_MIN = 7;

/** Highest row a start hold may sit on */
export const START_ROW_MAX = 13;

/** Middle hand holds must sit strictly below this row */
export const MIDDLE_ROW_LIMIT = 33;

/** Foot holds attached to each start hand */
export const START_FEET_PER_HAND = 2;

/** Chance that a middle move gets a foot hold */
export const FOOT_ATTACH_PROBABILITY = 0.35;

/** Largest distance between a middle hand and its foot hold */
export const FOOT_RADIUS = 4;

// =============================================================================
// DIFFICULTY
// =============================================================================

export const HOLD_DIFFICULTY_WEIGHT = 0.4;
export const DISTANCE_WEIGHT = 0.3;
export const ANGLE_WEIGHT = 0.2;
export const FLOW_PENALTY_WEIGHT = 0.1;

/** Mean move distance that saturates the distance term */
export const DISTANCE_REFERENCE_SPAN = 15;

/** Upper end of the common scale the four terms are expressed on */
export const TERM_SCALE = 5;

/** Rows 1-5: steep overhang section */
export const OVERHANG_ROW_MAX = 5;
export const OVERHANG_ADJUSTMENT = 0.5;

/** Rows 30-35: slab section */
export const SLAB_ROW_MIN = 30;
export const SLAB_ADJUSTMENT = -0.3;

/** Maps the mean angle adjustment [-0.3, 0.5] onto [0, 5] */
export const ANGLE_OFFSET = 0.3;
export const ANGLE_SCALE = 6.25;

/** Split of the flow-penalty term between zigzags and non-upward moves */
export const ZIGZAG_PENALTY_SHARE = 0.5;
export const NON_UPWARD_PENALTY_SHARE = 0.5;

export const INTERMEDIATE_THRESHOLD = 2.0;
export const HARD_THRESHOLD = 3.5;
export const VERY_HARD_THRESHOLD = 4.8;

// =============================================================================
// FLOW
// =============================================================================

export const ALTERNATION_WEIGHT = 0.5;
export const UPWARD_WEIGHT = 0.5;

/** Flow score at or above which a route counts as good flow */
export const GOOD_FLOW_THRESHOLD = 0.7;
