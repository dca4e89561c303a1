import { describe, expect, it } from "vitest";
import {
  angleAdjustment,
  createRoute,
  difficultyLabel,
  estimateDifficulty,
  estimateFlow,
  formatScore,
  scoreRoute,
} from "../src";
import { foot, hand, placed } from "./test-helpers";

// Three jug holds climbing right: (18,10) -> (19,14) -> (20,18)
const straightRoute = createRoute([
  placed("start", hand(18, 10)),
  placed("foot", foot(17, 6)),
  placed("hand", hand(19, 14)),
  placed("finish", hand(20, 18)),
]);

// Same heights, swinging back left on the last move
const alternatingRoute = createRoute([
  placed("start", hand(18, 10)),
  placed("hand", hand(19, 14)),
  placed("finish", hand(18, 18)),
]);

describe("estimateDifficulty", () => {
  it("scores the straight jug route as Easy", () => {
    const estimate = estimateDifficulty(straightRoute);
    expect(estimate.label).toBe("Easy");
    expect(estimate.score).toBeCloseTo(0.787310562561766, 10);
    expect(estimate.breakdown.hold).toBe(0);
    expect(estimate.breakdown.distance).toBeCloseTo(0.41231056256176607, 10);
    expect(estimate.breakdown.angle).toBeCloseTo(0.375, 10);
    expect(estimate.breakdown.flowPenalty).toBe(0);
  });

  it("ignores foot holds", () => {
    const withoutFeet = createRoute([
      placed("start", hand(18, 10)),
      placed("hand", hand(19, 14)),
      placed("finish", hand(20, 18)),
    ]);
    expect(estimateDifficulty(withoutFeet)).toEqual(
      estimateDifficulty(straightRoute),
    );
  });

  it("adds the overhang and zigzag terms", () => {
    const route = createRoute([
      placed("start", hand(5, 2, 4, "crimp")),
      placed("hand", hand(8, 4, 4, "crimp")),
      placed("finish", hand(5, 8, 4, "crimp")),
    ]);
    const estimate = estimateDifficulty(route);
    expect(estimate.breakdown.hold).toBeCloseTo(1.6, 10);
    expect(estimate.breakdown.distance).toBeCloseTo(0.4302775637731995, 10);
    expect(estimate.breakdown.angle).toBeCloseTo(0.7916666666666666, 10);
    expect(estimate.breakdown.flowPenalty).toBeCloseTo(0.25, 10);
    expect(estimate.score).toBeCloseTo(3.071944230439866, 10);
    expect(estimate.label).toBe("Intermediate");
  });

  it("saturates on long downward crimp moves", () => {
    const route = createRoute([
      placed("start", hand(1, 5, 5, "crimp")),
      placed("hand", hand(16, 1, 5, "crimp")),
      placed("hand", hand(1, 3, 5, "crimp")),
      placed("finish", hand(16, 2, 5, "crimp")),
    ]);
    const estimate = estimateDifficulty(route);
    expect(estimate.breakdown.distance).toBeCloseTo(1.5, 10);
    expect(estimate.breakdown.angle).toBeCloseTo(1, 10);
    expect(estimate.breakdown.flowPenalty).toBeCloseTo(5 / 12, 10);
    expect(estimate.score).toBeCloseTo(4.916666666666667, 10);
    expect(estimate.label).toBe("VeryHard");
  });

  it("returns zero for fewer than two hand holds", () => {
    const estimate = estimateDifficulty(
      createRoute([placed("start", hand(10, 10, 5))]),
    );
    expect(estimate.score).toBe(0);
    expect(estimate.label).toBe("Easy");
  });

  it("is pure", () => {
    expect(estimateDifficulty(straightRoute)).toEqual(
      estimateDifficulty(straightRoute),
    );
  });
});

describe("difficultyLabel", () => {
  it.each([
    [1.999, "Easy"],
    [2, "Intermediate"],
    [3.499, "Intermediate"],
    [3.5, "Hard"],
    [4.799, "Hard"],
    [4.8, "VeryHard"],
  ])("labels %s as %s", (score, label) => {
    expect(difficultyLabel(score)).toBe(label);
  });
});

describe("angleAdjustment", () => {
  it("splits the wall into overhang, vertical and slab", () => {
    expect(angleAdjustment(1)).toBe(0.5);
    expect(angleAdjustment(5)).toBe(0.5);
    expect(angleAdjustment(6)).toBe(0);
    expect(angleAdjustment(29)).toBe(0);
    expect(angleAdjustment(30)).toBe(-0.3);
    expect(angleAdjustment(35)).toBe(-0.3);
  });
});

describe("estimateFlow", () => {
  it("gives half marks to a straight upward route", () => {
    expect(estimateFlow(straightRoute)).toEqual({
      alternation: 0,
      upward: 1,
      flowScore: 0.5,
      goodFlow: false,
    });
  });

  it("gives full marks to an upward alternating route", () => {
    expect(estimateFlow(alternatingRoute)).toEqual({
      alternation: 1,
      upward: 1,
      flowScore: 1,
      goodFlow: true,
    });
  });

  it("is zero without moves", () => {
    const flow = estimateFlow(createRoute([placed("start", hand(10, 10))]));
    expect(flow.flowScore).toBe(0);
    expect(flow.goodFlow).toBe(false);
  });

  it("counts sideways moves against the upward share", () => {
    const route = createRoute([
      placed("start", hand(10, 10)),
      placed("hand", hand(13, 14)),
      placed("hand", hand(10, 14)),
      placed("finish", hand(13, 18)),
    ]);
    const flow = estimateFlow(route);
    expect(flow.alternation).toBe(1);
    expect(flow.upward).toBeCloseTo(2 / 3, 10);
    expect(flow.flowScore).toBeCloseTo(5 / 6, 10);
    expect(flow.goodFlow).toBe(true);
  });
});

describe("scoreRoute / formatScore", () => {
  it("combines both estimators", () => {
    const score = scoreRoute(alternatingRoute);
    expect(score.difficultyLabel).toBe("Easy");
    // Straight route score plus the zigzag share of the flow penalty
    expect(score.difficultyScore).toBeCloseTo(1.037310562561766, 10);
    expect(score.flowScore).toBe(1);
    expect(score.goodFlow).toBe(true);
  });

  it("formats the display lines", () => {
    expect(formatScore(scoreRoute(straightRoute))).toEqual([
      "Difficulty: Easy (Score: 0.79)",
    ]);
    expect(formatScore(scoreRoute(alternatingRoute))).toEqual([
      "Difficulty: Easy (Score: 1.04)",
      "Good Flow",
    ]);
    expect(
      formatScore({
        difficultyScore: 4.916666666666667,
        difficultyLabel: "VeryHard",
        flowScore: 0.25,
        goodFlow: false,
      }),
    ).toEqual(["Difficulty: Very Hard (Score: 4.92)"]);
  });
});
