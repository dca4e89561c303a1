import { z } from "zod";

/** Board edge length; export coordinates are 1-based */
const BOARD_EDGE = 35;

const CoordinateSchema = z
  .number()
  .int({ error: "Coordinates must be integers" })
  .min(1, { error: "Coordinates start at 1" })
  .max(BOARD_EDGE, { error: `Coordinates cannot exceed ${BOARD_EDGE}` });

export const RouteRoleSchema = z.enum(["start", "hand", "foot", "finish"]);

export const ExportedHoldSchema = z.object({
  col: CoordinateSchema,
  row: CoordinateSchema,
  type: RouteRoleSchema,
});

/**
 * On-disk route format: `{ "holds": [{ "col", "row", "type" }] }` in route order.
 */
export const RouteExportSchema = z.object({
  holds: z
    .array(ExportedHoldSchema)
    .min(1, { error: "A route needs at least one hold" }),
});

export type RouteRole = z.infer<typeof RouteRoleSchema>;
export type RouteExport = z.infer<typeof RouteExportSchema>;
