import type { z } from "zod";
import type { RandomSource } from "../random/random-source";
import { GenerationParametersSchema } from "../schemas/parameters";
import { ParameterError } from "../types/error";
import type { GenerationParameters } from "../types/parameters";
import { Err, Ok, type Result } from "../types/result";

/**
 * Defaults restored by "reset to defaults".
 */
export const DEFAULT_GENERATION_PARAMETERS: GenerationParameters = {
  minReach: 2,
  maxReach: 12,
  minMoves: 2,
  maxMoves: 12,
  allowDownwardOrSideways: false,
  allowTwoFinishes: true,
};

export type BuildParametersInput = Partial<GenerationParameters>;

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message,
  );
}

/**
 * Fill missing fields from {@link DEFAULT_GENERATION_PARAMETERS} and validate.
 */
export function buildGenerationParameters(
  input: BuildParametersInput = {},
): Result<GenerationParameters, ParameterError> {
  const candidate: GenerationParameters = {
    ...DEFAULT_GENERATION_PARAMETERS,
    ...input,
  };

  const parsed = GenerationParametersSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return Err(
      new ParameterError(`Invalid generation parameters: ${issues.join("; ")}`, issues),
    );
  }
  return Ok(parsed.data);
}

/**
 * Random but always valid parameters.
 *
 * Ranges lean wider than the defaults so that hard routes come up too.
 */
export function randomizeParameters(random: RandomSource): GenerationParameters {
  const minReach = random.range(2, 15);
  const maxReach = random.range(Math.max(minReach + 1, 8), 20);
  const minMoves = random.range(2, 15);
  const maxMoves = random.range(Math.max(minMoves + 1, 10), 20);

  return {
    minReach,
    maxReach,
    minMoves,
    maxMoves,
    allowTwoFinishes: random.probability(0.5),
    allowDownwardOrSideways: random.probability(0.2),
  };
}
