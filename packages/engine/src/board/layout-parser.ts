/**
 * Board layout parser.
 *
 * One record per line, whitespace separated:
 *
 * ```text
 * col row type [direction gripType baseDifficulty]
 * 18  10  h    u         jug      0
 * 17  6   f
 * 1   1   n
 * ```
 *
 * `type` is `h` (hand), `f` (foot) or `n` (none). Hand records carry all six
 * fields, the others exactly three. Blank lines and `#` comments are skipped.
 */

import { readFile } from "node:fs/promises";
import { Err, LayoutError, Ok, type Result } from "@routesetter/contracts";
import { z } from "zod";
import { Board } from "./board";
import {
  BOARD_SIZE,
  GRIP_TYPES,
  type HandHold,
  type Hold,
  type HoldDirection,
  positionKey,
} from "./types";

const WholeNumberToken = z
  .string()
  .regex(/^\d+$/, { error: "must be a whole number" })
  .transform(Number);

const CoordinateToken = WholeNumberToken.pipe(
  z
    .number()
    .min(1, { error: `must be between 1 and ${BOARD_SIZE}` })
    .max(BOARD_SIZE, { error: `must be between 1 and ${BOARD_SIZE}` }),
);

const DifficultyToken = WholeNumberToken.pipe(
  z
    .number()
    .min(0, { error: "must be between 0 and 5" })
    .max(5, { error: "must be between 0 and 5" }),
);

const HandRecordSchema = z.object({
  col: CoordinateToken,
  row: CoordinateToken,
  direction: z.enum(["u", "r", "d", "l"], { error: "is not one of u, r, d, l" }),
  gripType: z.enum(GRIP_TYPES, { error: "is not a known grip type" }),
  baseDifficulty: DifficultyToken,
});

const PlainRecordSchema = z.object({
  col: CoordinateToken,
  row: CoordinateToken,
});

const DIRECTION_TOKENS: Record<"u" | "r" | "d" | "l", HoldDirection> = {
  u: "up",
  r: "right",
  d: "down",
  l: "left",
};

/**
 * Turn the first zod issue into a readable message, quoting the raw token.
 */
function describeIssue(
  error: z.ZodError,
  raw: Readonly<Record<string, string>>,
): string {
  const issue = error.issues[0];
  if (!issue) return "invalid record";
  const field = issue.path.map(String).join(".");
  const token = raw[field];
  return token === undefined
    ? `${field} ${issue.message}`
    : `${field} ${issue.message} (got '${token}')`;
}

function parseRecord(tokens: readonly string[], line: number): Result<Hold, LayoutError> {
  const [col = "", row = "", type, direction, gripType, baseDifficulty] = tokens;

  if (type === undefined) {
    return Err(new LayoutError("expected at least 'col row type'", line));
  }

  if (type === "h") {
    if (
      tokens.length !== 6 ||
      direction === undefined ||
      gripType === undefined ||
      baseDifficulty === undefined
    ) {
      return Err(
        new LayoutError(
          "hand holds need direction, grip type and base difficulty",
          line,
          { fields: tokens.length },
        ),
      );
    }
    const raw = { col, row, direction, gripType, baseDifficulty };
    const parsed = HandRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return Err(new LayoutError(describeIssue(parsed.error, raw), line));
    }
    const hold: HandHold = {
      col: parsed.data.col,
      row: parsed.data.row,
      kind: "hand",
      direction: DIRECTION_TOKENS[parsed.data.direction],
      gripType: parsed.data.gripType,
      baseDifficulty: parsed.data.baseDifficulty,
    };
    return Ok(hold);
  }

  if (type !== "f" && type !== "n") {
    return Err(new LayoutError(`unknown hold type '${type}'`, line));
  }

  if (tokens.length !== 3) {
    return Err(
      new LayoutError(
        "only hand holds carry direction, grip type or difficulty",
        line,
        { fields: tokens.length },
      ),
    );
  }

  const raw = { col, row };
  const parsed = PlainRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return Err(new LayoutError(describeIssue(parsed.error, raw), line));
  }
  const hold: Hold =
    type === "f"
      ? { col: parsed.data.col, row: parsed.data.row, kind: "foot" }
      : { col: parsed.data.col, row: parsed.data.row, kind: "none" };
  return Ok(hold);
}

/**
 * Parse layout text into a Board without throwing.
 */
export function parseBoardLayout(text: string): Result<Board, LayoutError> {
  const holds: Hold[] = [];
  const seen = new Map<string, number>();
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const content = (lines[i] ?? "").trim();
    if (content === "" || content.startsWith("#")) continue;

    const line = i + 1;
    const record = parseRecord(content.split(/\s+/), line);
    if (!record.success) return Err(record.error);

    const hold = record.value;
    const key = positionKey(hold);
    const firstLine = seen.get(key);
    if (firstLine !== undefined) {
      return Err(
        new LayoutError(
          `duplicate position (${hold.col}, ${hold.row}), first defined on line ${firstLine}`,
          line,
        ),
      );
    }
    seen.set(key, line);
    holds.push(hold);
  }

  return Ok(Board.fromHolds(holds));
}

/**
 * Parse layout text into a Board.
 * @throws {LayoutError} On the first malformed line
 */
export function loadBoard(text: string): Board {
  return parseBoardLayout(text).getOrThrow();
}

/**
 * Read and parse a layout file.
 * @throws {LayoutError} On the first malformed line
 */
export async function loadBoardFile(path: string): Promise<Board> {
  const text = await readFile(path, "utf8");
  return loadBoard(text);
}
