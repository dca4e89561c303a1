/**
 * Error codes for route setter operations.
 */
export type RouteSetterErrorCode =
  | "LAYOUT_INVALID"
  | "OUT_OF_BOUNDS"
  | "PARAMETERS_INVALID"
  | "GENERATION_FAILED"
  | "EXPORT_FAILED";

/**
 * Route construction stage that a generation failure belongs to.
 */
export type GenerationPhase = "start" | "middle" | "finish";

/**
 * Base class for every error raised by the route setter.
 *
 * @example
 * ```typescript
 * try {
 *   board.lookup(40, 2);
 * } catch (error) {
 *   if (RouteSetterError.isRouteSetterError(error)) {
 *     console.warn(error.code, error.details);
 *   }
 * }
 * ```
 */
export class RouteSetterError extends Error {
  override readonly name: string = "RouteSetterError";

  constructor(
    public readonly code: RouteSetterErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static isRouteSetterError(error: unknown): error is RouteSetterError {
    return error instanceof RouteSetterError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: RouteSetterErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Malformed board layout data. Fatal at load time.
 */
export class LayoutError extends RouteSetterError {
  override readonly name = "LayoutError";

  constructor(
    message: string,
    public readonly line: number,
    details?: Record<string, unknown>,
  ) {
    super("LAYOUT_INVALID", `Line ${line}: ${message}`, { line, ...details });
  }
}

/**
 * Board lookup outside the 1..35 grid.
 */
export class OutOfBoundsError extends RouteSetterError {
  override readonly name = "OutOfBoundsError";

  constructor(
    public readonly col: number,
    public readonly row: number,
  ) {
    super("OUT_OF_BOUNDS", `Position (${col}, ${row}) is outside the board`, {
      col,
      row,
    });
  }
}

/**
 * Generation parameters rejected before any hold was picked.
 */
export class ParameterError extends RouteSetterError {
  override readonly name = "ParameterError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super("PARAMETERS_INVALID", message, { issues });
  }
}

/**
 * No valid route found within the attempt budget.
 * `phase` tells the caller which constraint to relax.
 */
export class GenerationError extends RouteSetterError {
  override readonly name = "GenerationError";

  constructor(
    public readonly phase: GenerationPhase,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super("GENERATION_FAILED", `${phase} phase: ${message}`, {
      phase,
      ...details,
    });
  }
}

/**
 * Route could not be exported or imported. For a generated route this means
 * an invariant was broken upstream.
 */
export class ExportError extends RouteSetterError {
  override readonly name = "ExportError";

  constructor(message: string, details?: Record<string, unknown>) {
    super("EXPORT_FAILED", message, details);
  }
}
