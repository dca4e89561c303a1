/**
 * Generation API
 *
 * High-level entry point: validate parameters, run the phases, retry on
 * failure and hand back a discriminated result with the collected trace.
 */

import {
  buildGenerationParameters,
  type GenerationError,
  type GenerationParameters,
  ParameterError,
  type RandomSource,
  randomUint32,
  SeededRandom,
} from "@routesetter/contracts";
import type { Board } from "./board/board";
import { buildRoute, createContext } from "./generator";
import { createTraceCollector, type TraceEvent } from "./pipeline/trace";
import type { Route } from "./route/types";

/**
 * Generation options
 */
export interface GenerateRouteOptions {
  /**
   * Randomness source. Takes precedence over `seed`.
   */
  readonly random?: RandomSource;
  /**
   * Seed for a fresh {@link SeededRandom}. Default: a random 32-bit value.
   */
  readonly seed?: number;
  /**
   * Record trace events. Default: false
   */
  readonly trace?: boolean;
  /**
   * Extra attempts after a failed generation, reusing the same random source.
   * Default: 0
   */
  readonly retries?: number;
}

export interface GenerationSuccess {
  readonly success: true;
  readonly route: Route;
  /** Attempts used, the successful one included */
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface GenerationFailure {
  readonly success: false;
  readonly error: GenerationError | ParameterError;
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type GenerationResult = GenerationSuccess | GenerationFailure;

function resolveRandom(options: GenerateRouteOptions): {
  random: RandomSource;
  seed: number | undefined;
} {
  if (options.random) {
    const { random } = options;
    return {
      random,
      seed: random instanceof SeededRandom ? random.seed : undefined,
    };
  }
  const random = new SeededRandom(options.seed ?? randomUint32());
  return { random, seed: random.seed };
}

/**
 * Generate a route on a board.
 *
 * @example
 * ```typescript
 * const board = await loadBoardFile("board-layout.txt");
 * const result = generateRoute(board, DEFAULT_GENERATION_PARAMETERS, {
 *   seed: 12345,
 * });
 *
 * if (result.success) {
 *   console.log(formatScore(scoreRoute(result.route)).join("\n"));
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function generateRoute(
  board: Board,
  params: GenerationParameters,
  options: GenerateRouteOptions = {},
): GenerationResult {
  const startTime = performance.now();
  const trace = createTraceCollector(options.trace ?? false);
  const retries = options.retries ?? 0;

  const fail = (
    error: GenerationError | ParameterError,
    attempts: number,
  ): GenerationFailure => ({
    success: false,
    error,
    attempts,
    trace: trace.getEvents(),
    durationMs: performance.now() - startTime,
  });

  if (!Number.isInteger(retries) || retries < 0) {
    return fail(
      new ParameterError(`Retries must be a non-negative integer, got ${retries}`),
      0,
    );
  }

  const validated = buildGenerationParameters(params);
  if (!validated.success) {
    return fail(validated.error, 0);
  }

  const { random, seed } = resolveRandom(options);
  trace.start("route");

  let attempt = 0;
  for (;;) {
    attempt++;
    const ctx = createContext(board, validated.value, random, trace);
    const built = buildRoute(ctx, seed);

    if (built.success) {
      trace.end("route", performance.now() - startTime);
      return {
        success: true,
        route: built.value,
        attempts: attempt,
        trace: trace.getEvents(),
        durationMs: performance.now() - startTime,
      };
    }

    if (attempt > retries) {
      trace.end("route", performance.now() - startTime);
      return fail(built.error, attempt);
    }
    trace.warning(
      "route",
      `Attempt ${attempt} failed (${built.error.message}), retrying`,
    );
  }
}
