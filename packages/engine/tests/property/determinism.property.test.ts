/**
 * Determinism Property Tests
 *
 * Same seed, same route; same route, same score and export.
 */

import { DEFAULT_GENERATION_PARAMETERS } from "@routesetter/contracts";
import { beforeAll, describe, expect, it } from "vitest";
import {
  type Board,
  generateRoute,
  loadBoardFile,
  parseRouteExport,
  restoreRoute,
  scoreRoute,
  serializeRoute,
} from "../../src";
import { BUNDLED_LAYOUT } from "../test-helpers";

const SEED_COUNT = 50;

let board: Board;

beforeAll(async () => {
  board = await loadBoardFile(BUNDLED_LAYOUT);
});

describe("property: determinism", () => {
  it("the same seed produces the same route", () => {
    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const first = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, {
        seed,
        retries: 40,
      });
      const second = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, {
        seed,
        retries: 40,
      });
      expect(second.success).toBe(first.success);
      if (first.success && second.success) {
        expect(second.route).toEqual(first.route);
        expect(second.attempts).toBe(first.attempts);
      }
    }
  });

  it("scores are pure and within range", () => {
    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const result = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, {
        seed,
        retries: 40,
      });
      if (!result.success) continue;

      const score = scoreRoute(result.route);
      expect(scoreRoute(result.route)).toEqual(score);
      expect(score.difficultyScore).toBeGreaterThanOrEqual(0);
      expect(score.difficultyScore).toBeLessThanOrEqual(5);
      expect(score.flowScore).toBeGreaterThanOrEqual(0);
      expect(score.flowScore).toBeLessThanOrEqual(1);
    }
  });

  it("export and import preserve the route and its score", () => {
    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const result = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, {
        seed,
        retries: 40,
      });
      if (!result.success) continue;

      const restored = serializeRoute(result.route)
        .flatMap(parseRouteExport)
        .flatMap((exported) => restoreRoute(exported, board));

      expect(restored.value.holds).toEqual(result.route.holds);
      expect(scoreRoute(restored.value)).toEqual(scoreRoute(result.route));
    }
  });
});
