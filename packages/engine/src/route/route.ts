import type { FootHold, HandHold } from "../board/types";
import type { HandRole, PlacedHold, Route } from "./types";

export function createRoute(holds: readonly PlacedHold[], seed?: number): Route {
  const frozen = Object.freeze(holds.map((placed) => Object.freeze({ ...placed })));
  return Object.freeze(seed === undefined ? { holds: frozen } : { holds: frozen, seed });
}

function isHandPlacement(
  placed: PlacedHold,
): placed is Extract<PlacedHold, { role: HandRole }> {
  return placed.role !== "foot";
}

/**
 * The ordered hand-hold progression: start, middle and finish holds.
 */
export function handSequence(route: Route): HandHold[] {
  return route.holds.filter(isHandPlacement).map((placed) => placed.hold);
}

export function holdsWithRole(route: Route, role: HandRole): HandHold[] {
  return route.holds
    .filter(isHandPlacement)
    .filter((placed) => placed.role === role)
    .map((placed) => placed.hold);
}

export function footHolds(route: Route): FootHold[] {
  const feet: FootHold[] = [];
  for (const placed of route.holds) {
    if (placed.role === "foot") feet.push(placed.hold);
  }
  return feet;
}

/**
 * Number of middle hand moves (starts and finishes excluded).
 */
export function moveCount(route: Route): number {
  return holdsWithRole(route, "hand").length;
}
