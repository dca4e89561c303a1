import { z } from "zod";
import { PARAMETER_MAX, PARAMETER_MIN } from "../types/parameters";

const ReachSchema = z
  .number()
  .min(PARAMETER_MIN, { error: `Reach must be at least ${PARAMETER_MIN}` })
  .max(PARAMETER_MAX, { error: `Reach cannot exceed ${PARAMETER_MAX}` });

const MovesSchema = z
  .number()
  .int({ error: "Move counts must be integers" })
  .min(PARAMETER_MIN, { error: `Move count must be at least ${PARAMETER_MIN}` })
  .max(PARAMETER_MAX, { error: `Move count cannot exceed ${PARAMETER_MAX}` });

export const GenerationParametersSchema = z
  .object({
    minReach: ReachSchema,
    maxReach: ReachSchema,
    minMoves: MovesSchema,
    maxMoves: MovesSchema,
    allowDownwardOrSideways: z.boolean(),
    allowTwoFinishes: z.boolean(),
  })
  .superRefine((data, ctx) => {
    if (data.minReach > data.maxReach) {
      ctx.addIssue({
        code: "custom",
        message: "Min reach must be less than or equal to max reach",
        path: ["minReach"],
      });
    }
    if (data.minMoves > data.maxMoves) {
      ctx.addIssue({
        code: "custom",
        message: "Min moves must be less than or equal to max moves",
        path: ["minMoves"],
      });
    }
  });
