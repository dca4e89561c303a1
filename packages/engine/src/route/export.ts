/**
 * Route export and import.
 *
 * The JSON shape is `{ "holds": [{ "col", "row", "type" }] }` in route order,
 * validated by `RouteExportSchema` in both directions.
 */

import {
  Err,
  ExportError,
  formatIssues,
  Ok,
  Result,
  type RouteExport,
  RouteExportSchema,
} from "@routesetter/contracts";
import type { Board } from "../board/board";
import { createRoute } from "./route";
import type { PlacedHold, Route } from "./types";

const MAX_STARTS = 2;
const MAX_FINISHES = 2;

/**
 * First broken route invariant, or `undefined` when the holds form a route.
 */
function findViolation(holds: readonly PlacedHold[]): string | undefined {
  let starts = 0;
  let finishes = 0;

  for (const [index, placed] of holds.entries()) {
    const expected = placed.role === "foot" ? "foot" : "hand";
    if (placed.hold.kind !== expected) {
      return `Hold ${index + 1} at (${placed.hold.col}, ${placed.hold.row}) is a ${placed.hold.kind} hold but has role ${placed.role}`;
    }
    if (placed.role === "start") starts++;
    if (placed.role === "finish") finishes++;
  }

  if (starts < 1 || starts > MAX_STARTS) {
    return `A route needs 1 or 2 start holds, found ${starts}`;
  }
  if (finishes < 1 || finishes > MAX_FINISHES) {
    return `A route needs 1 or 2 finish holds, found ${finishes}`;
  }
  return undefined;
}

function validateExport(candidate: unknown): Result<RouteExport, ExportError> {
  const parsed = RouteExportSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return Err(
      new ExportError(`Invalid route export: ${issues.join("; ")}`, { issues }),
    );
  }
  return Ok(parsed.data);
}

/**
 * Convert a route to its export structure.
 */
export function exportRoute(route: Route): Result<RouteExport, ExportError> {
  const violation = findViolation(route.holds);
  if (violation !== undefined) {
    return Err(new ExportError(violation));
  }

  return validateExport({
    holds: route.holds.map((placed) => ({
      col: placed.hold.col,
      row: placed.hold.row,
      type: placed.role,
    })),
  });
}

/**
 * Export a route as pretty-printed JSON.
 */
export function serializeRoute(route: Route): Result<string, ExportError> {
  return exportRoute(route).map((exported) => JSON.stringify(exported, null, 2));
}

/**
 * Parse exported JSON text back into its structure.
 */
export function parseRouteExport(json: string): Result<RouteExport, ExportError> {
  return Result.fromThrowable(
    (): unknown => JSON.parse(json),
    (error) =>
      new ExportError("Route export is not valid JSON", {
        cause: error instanceof Error ? error.message : String(error),
      }),
  ).flatMap(validateExport);
}

/**
 * Resolve an exported route against a board so it can be scored or rendered.
 */
export function restoreRoute(
  exported: RouteExport,
  board: Board,
): Result<Route, ExportError> {
  const holds: PlacedHold[] = [];

  for (const entry of exported.holds) {
    const hold = board.lookup(entry.col, entry.row);
    if (entry.type === "foot") {
      if (hold.kind !== "foot") {
        return Err(
          new ExportError(
            `Expected a foot hold at (${entry.col}, ${entry.row}), found ${hold.kind}`,
            { col: entry.col, row: entry.row },
          ),
        );
      }
      holds.push({ role: "foot", hold });
    } else {
      if (hold.kind !== "hand") {
        return Err(
          new ExportError(
            `Expected a hand hold at (${entry.col}, ${entry.row}), found ${hold.kind}`,
            { col: entry.col, row: entry.row },
          ),
        );
      }
      holds.push({ role: entry.type, hold });
    }
  }

  const violation = findViolation(holds);
  if (violation !== undefined) {
    return Err(new ExportError(violation));
  }
  return Ok(createRoute(holds));
}
