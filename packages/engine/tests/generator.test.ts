import {
  DEFAULT_GENERATION_PARAMETERS,
  GenerationError,
  type GenerationParameters,
  SeededRandom,
} from "@routesetter/contracts";
import type { HandHold } from "../src";
import { describe, expect, it } from "vitest";
import {
  createContext,
  createTraceCollector,
  footCandidates,
  holdPairs,
  moveCandidates,
  nearestFeetBelow,
  placeFinishHolds,
  placeMiddleMoves,
  placeStartHolds,
} from "../src";
import { boardOf, describeRoute, foot, hand, ScriptedRandom } from "./test-helpers";

const params: GenerationParameters = {
  minReach: 2,
  maxReach: 6,
  minMoves: 2,
  maxMoves: 2,
  allowDownwardOrSideways: false,
  allowTwoFinishes: false,
};

describe("start phase", () => {
  it("orders a start pair by row", () => {
    const board = boardOf([hand(10, 8), hand(13, 10)]);
    // count = 2, then the only pair
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([0.9, 0.1]),
      createTraceCollector(false),
    );
    const result = placeStartHolds(ctx);
    expect(describeRoute(result.value.placed)).toEqual([
      "start(10,8)",
      "start(13,10)",
    ]);
    expect(result.value.top).toEqual(hand(13, 10));
  });

  it("refuses a same-row pair when moves must go up", () => {
    const board = boardOf([hand(10, 8), hand(13, 8)]);
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([0.9]),
      createTraceCollector(false),
    );
    const result = placeStartHolds(ctx);
    expect(result.error).toBeInstanceOf(GenerationError);
    expect(result.error.phase).toBe("start");
    expect(result.error.message).toBe(
      "start phase: no reachable start pair among 2 holds",
    );
  });

  it("accepts a same-row pair when sideways moves are allowed", () => {
    const board = boardOf([hand(10, 8), hand(13, 8)]);
    const ctx = createContext(
      board,
      { ...params, allowDownwardOrSideways: true },
      new ScriptedRandom([0.9, 0.1]),
      createTraceCollector(false),
    );
    expect(describeRoute(placeStartHolds(ctx).value.placed)).toEqual([
      "start(10,8)",
      "start(13,8)",
    ]);
  });

  it("uses a lone hold in the band as a single start", () => {
    const board = boardOf([hand(10, 8), hand(10, 20)]);
    const random = new ScriptedRandom([0.7]);
    const ctx = createContext(board, params, random, createTraceCollector(false));
    expect(describeRoute(placeStartHolds(ctx).value.placed)).toEqual([
      "start(10,8)",
    ]);
    expect(random.consumed).toBe(1);
  });

  it("lists pairs lower hold first, skipping out-of-reach ones", () => {
    const ctx = createContext(
      boardOf([]),
      params,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    const pairs = holdPairs(ctx, [hand(10, 8), hand(12, 10), hand(20, 12)]);
    expect(pairs).toEqual([[hand(10, 8), hand(12, 10)]]);
  });

  it("fails when the start band is empty", () => {
    const ctx = createContext(
      boardOf([hand(10, 4), hand(10, 20)]),
      params,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    expect(placeStartHolds(ctx).error.message).toBe(
      "start phase: no hand holds in rows 7-13",
    );
  });

  it("attaches the two nearest feet below each start hand", () => {
    const board = boardOf([
      hand(10, 8),
      foot(10, 6),
      foot(9, 6),
      foot(11, 6),
      foot(10, 9),
      foot(10, 2),
    ]);
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    // (9,6) and (11,6) tie at sqrt(5); the lower column wins
    expect(nearestFeetBelow(ctx, hand(10, 8))).toEqual([
      foot(10, 6),
      foot(9, 6),
    ]);
  });
});

/** Hand holds on every cell of the given rows */
function fullRows(from: number, to: number): HandHold[] {
  const holds: HandHold[] = [];
  for (let row = from; row <= to; row++) {
    for (let col = 1; col <= 35; col++) holds.push(hand(col, row));
  }
  return holds;
}

describe("middle phase", () => {
  const oneMove = { ...params, minMoves: 1, maxMoves: 1 };

  it("finds the only reachable hold in a large pool", () => {
    // (10,8) -> (10,12) -> (10,16) is the one upward chain in reach
    const board = boardOf([
      ...fullRows(1, 4),
      hand(10, 8),
      hand(10, 12),
      hand(10, 16),
      ...fullRows(25, 32),
    ]);
    for (let seed = 0; seed < 50; seed++) {
      const ctx = createContext(
        board,
        params,
        new SeededRandom(seed),
        createTraceCollector(false),
      );
      const result = placeMiddleMoves(ctx, hand(10, 8));
      if (!result.success) throw new Error(result.error.message);
      expect(describeRoute(result.value.placed)).toEqual([
        "hand(10,12)",
        "hand(10,16)",
      ]);
    }
  });

  it("offers only unused upward holds in reach", () => {
    const board = boardOf([
      hand(10, 8),
      hand(10, 12),
      hand(13, 12),
      hand(10, 6),
      hand(12, 8),
      hand(10, 30),
      hand(10, 33),
    ]);
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    ctx.used.add("13,12");
    expect(moveCandidates(ctx, hand(10, 8))).toEqual([hand(10, 12)]);

    const sideways = createContext(
      board,
      { ...params, allowDownwardOrSideways: true },
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    expect(moveCandidates(sideways, hand(10, 8))).toEqual([
      hand(10, 6),
      hand(12, 8),
      hand(10, 12),
      hand(13, 12),
    ]);
  });

  it("accepts a move of exactly the max reach", () => {
    const board = boardOf([hand(10, 8), hand(10, 14)]);
    // move count, the pick, no foot
    const ctx = createContext(
      board,
      oneMove,
      new ScriptedRandom([0.5, 0.5, 0.9]),
      createTraceCollector(false),
    );
    const result = placeMiddleMoves(ctx, hand(10, 8));
    expect(describeRoute(result.value.placed)).toEqual(["hand(10,14)"]);
    expect(result.value.top).toEqual(hand(10, 14));
  });

  it("fails on a move just beyond the max reach", () => {
    // sqrt(37) is a little over 6
    const board = boardOf([hand(10, 8), hand(11, 14)]);
    const ctx = createContext(
      board,
      oneMove,
      new ScriptedRandom([0.5]),
      createTraceCollector(false),
    );
    const result = placeMiddleMoves(ctx, hand(10, 8));
    expect(result.error.message).toBe(
      "middle phase: no reachable hold for move 1 of 1 from (10, 8)",
    );
  });

  it("offers only unused nearby feet at or below the hand", () => {
    const board = boardOf([
      hand(11, 12),
      foot(12, 10),
      foot(15, 12),
      foot(11, 13),
      foot(11, 7),
    ]);
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    ctx.used.add("12,10");
    expect(footCandidates(ctx, hand(11, 12))).toEqual([foot(15, 12)]);
    ctx.used.clear();
    expect(footCandidates(ctx, hand(11, 12))).toEqual([
      foot(12, 10),
      foot(15, 12),
    ]);
  });
});

describe("finish phase", () => {
  it("picks a reachable pair on different rows, ordered by row", () => {
    const board = boardOf([hand(10, 14), hand(12, 14), hand(11, 17)]);
    const trace = createTraceCollector(true);
    const ctx = createContext(
      board,
      { ...params, maxReach: 8, allowTwoFinishes: true },
      // count = 2; (10,14)+(12,14) share a row, leaving two pairs
      new ScriptedRandom([0.9, 0.1]),
      trace,
    );
    const result = placeFinishHolds(ctx, hand(10, 10));
    expect(describeRoute(result.value.placed)).toEqual([
      "finish(10,14)",
      "finish(11,17)",
    ]);
    expect(result.value.top).toEqual(hand(11, 17));

    const decision = trace.getEvents().find((e) => e.eventType === "decision");
    expect(decision).toMatchObject({
      scope: "finish",
      eventType: "decision",
      data: {
        question: "Finish pair",
        candidates: 2,
        chosen: ["(10, 14)", "(11, 17)"],
        reason: "uniform pick among reachable pairs",
      },
    });
  });

  it("uses a single finish when two are not allowed", () => {
    const board = boardOf([hand(10, 14), hand(12, 14)]);
    const ctx = createContext(
      board,
      params,
      new ScriptedRandom([0.6]),
      createTraceCollector(false),
    );
    expect(describeRoute(placeFinishHolds(ctx, hand(10, 10)).value.placed)).toEqual(
      ["finish(12,14)"],
    );
  });

  it("uses a single finish when only one hold is in reach", () => {
    const board = boardOf([hand(10, 14), hand(20, 30)]);
    const random = new ScriptedRandom([0.2]);
    const ctx = createContext(
      board,
      { ...params, allowTwoFinishes: true },
      random,
      createTraceCollector(false),
    );
    expect(describeRoute(placeFinishHolds(ctx, hand(10, 10)).value.placed)).toEqual(
      ["finish(10,14)"],
    );
    expect(random.consumed).toBe(1);
  });

  it("fails when nothing above is reachable", () => {
    const ctx = createContext(
      boardOf([hand(12, 16), hand(30, 30)]),
      DEFAULT_GENERATION_PARAMETERS,
      new ScriptedRandom([]),
      createTraceCollector(false),
    );
    const result = placeFinishHolds(ctx, hand(12, 16));
    expect(result.error.message).toBe(
      "finish phase: no reachable hold above (12, 16)",
    );
    expect(result.error.details).toEqual({
      phase: "finish",
      from: { col: 12, row: 16 },
    });
  });
});
