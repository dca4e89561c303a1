import type { RouteRole } from "@routesetter/contracts";
import type { FootHold, HandHold } from "../board/types";

export type HandRole = Exclude<RouteRole, "foot">;

/**
 * A board hold placed on a route with the role it plays there.
 */
export type PlacedHold =
  | { readonly role: HandRole; readonly hold: HandHold }
  | { readonly role: "foot"; readonly hold: FootHold };

/**
 * A generated route.
 *
 * `holds` is in climb order: start hands, their feet, then each middle hand
 * followed by its optional foot, then the finishes. The hand holds alone
 * (roles start, hand, finish) form the progression the estimators measure.
 */
export interface Route {
  readonly holds: readonly PlacedHold[];
  /** Seed of the random source that produced the route, when known */
  readonly seed?: number;
}
