#!/usr/bin/env node
/**
 * Route Generator Script
 *
 * Usage:
 *   npm run generate -- [options]
 *
 * Options:
 *   --layout <path>       Board layout file (default: data/board-layout.txt)
 *   --seed <n>            Seed for generation (default: random)
 *   --min-reach <n>       Minimum move distance (default: 2)
 *   --max-reach <n>       Maximum move distance (default: 12)
 *   --min-moves <n>       Minimum middle moves (default: 2)
 *   --max-moves <n>       Maximum middle moves (default: 12)
 *   --allow-downward      Allow downward and sideways moves
 *   --single-finish       Always use a single finish hold
 *   --randomize           Draw random parameters (seeded)
 *   --retries <n>         Extra attempts after a failure (default: 10)
 *   --output <path>       Write the route export JSON to a file
 *   --trace               Show generation trace/decisions
 *   --quiet               Minimal console output
 *   --no-color            Disable ANSI colors
 *   --help                Show this help
 *
 * Examples:
 *   npm run generate -- --seed 12345
 *   npm run generate -- --max-reach 8 --min-moves 6 --max-moves 10
 *   npm run generate -- --randomize --trace --output route.json
 */

import { writeFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  buildGenerationParameters,
  type BuildParametersInput,
  type GenerationParameters,
  randomizeParameters,
  randomUint32,
  RouteSetterError,
  SeededRandom,
} from "@routesetter/contracts";
import {
  formatScore,
  type GenerationResult,
  generateRoute,
  loadBoardFile,
  printRoute,
  scoreRoute,
  serializeRoute,
  type TraceEvent,
} from "../src";

const DEFAULT_LAYOUT = fileURLToPath(
  new URL("../data/board-layout.txt", import.meta.url),
);

/** Upward-only routes with long move counts often fail on the first try */
const DEFAULT_RETRIES = 10;

// =============================================================================
// CLI PARSING
// =============================================================================

type MutableParametersInput = {
  -readonly [K in keyof BuildParametersInput]: BuildParametersInput[K];
};

interface Options {
  layout: string;
  seed: number;
  parameters: BuildParametersInput;
  randomize: boolean;
  retries: number;
  output: string | undefined;
  trace: boolean;
  quiet: boolean;
  color: boolean;
  help: boolean;
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || Number.isNaN(parsed)) {
    throw new Error(`${flag} expects a number, got '${value ?? ""}'`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function parseArgs(args: readonly string[]): Options {
  const options: Options = {
    layout: DEFAULT_LAYOUT,
    seed: randomUint32(),
    parameters: {},
    randomize: false,
    retries: DEFAULT_RETRIES,
    output: undefined,
    trace: false,
    quiet: false,
    color: true,
    help: false,
  };
  const parameters: MutableParametersInput = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--layout":
      case "-l":
        options.layout = requireValue(arg, next);
        i++;
        break;
      case "--seed":
      case "-s":
        options.seed = parseNumber(arg, next);
        i++;
        break;
      case "--min-reach":
        parameters.minReach = parseNumber(arg, next);
        i++;
        break;
      case "--max-reach":
        parameters.maxReach = parseNumber(arg, next);
        i++;
        break;
      case "--min-moves":
        parameters.minMoves = parseNumber(arg, next);
        i++;
        break;
      case "--max-moves":
        parameters.maxMoves = parseNumber(arg, next);
        i++;
        break;
      case "--allow-downward":
        parameters.allowDownwardOrSideways = true;
        break;
      case "--single-finish":
        parameters.allowTwoFinishes = false;
        break;
      case "--randomize":
      case "-r":
        options.randomize = true;
        break;
      case "--retries":
        options.retries = parseNumber(arg, next);
        i++;
        break;
      case "--output":
      case "-o":
        options.output = requireValue(arg, next);
        i++;
        break;
      case "--trace":
      case "-t":
        options.trace = true;
        break;
      case "--quiet":
      case "-q":
        options.quiet = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option '${arg ?? ""}' (see --help)`);
    }
  }

  options.parameters = parameters;
  return options;
}

function showHelp(): void {
  console.log(`
Route Generator

Usage:
  npm run generate -- [options]

Options:
  --layout, -l <path>   Board layout file (default: data/board-layout.txt)
  --seed, -s <n>        Seed for generation (default: random)
  --min-reach <n>       Minimum move distance (default: 2)
  --max-reach <n>       Maximum move distance (default: 12)
  --min-moves <n>       Minimum middle moves (default: 2)
  --max-moves <n>       Maximum middle moves (default: 12)
  --allow-downward      Allow downward and sideways moves
  --single-finish       Always use a single finish hold
  --randomize, -r       Draw random parameters (seeded)
  --retries <n>         Extra attempts after a failure (default: 10)
  --output, -o <path>   Write the route export JSON to a file
  --trace, -t           Show generation trace/decisions
  --quiet, -q           Minimal console output
  --no-color            Disable ANSI colors
  --help, -h            Show this help

Examples:
  npm run generate -- --seed 12345
  npm run generate -- --max-reach 8 --min-moves 6 --max-moves 10
  npm run generate -- --randomize --trace --output route.json
`);
}

// =============================================================================
// COLORS
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

function c(color: keyof typeof colors, text: string, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

// =============================================================================
// OUTPUT
// =============================================================================

function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function printHeader(
  options: Options,
  parameters: GenerationParameters,
): void {
  if (options.quiet) return;

  const on = options.color;
  console.log(c("bold", "\nRoute Generator", on));
  console.log(c("dim", "─".repeat(40), on));
  console.log(`  Layout:     ${c("cyan", options.layout, on)}`);
  console.log(`  Seed:       ${c("cyan", options.seed.toString(), on)}`);
  console.log(
    `  Reach:      ${c("cyan", `${parameters.minReach}-${parameters.maxReach}`, on)}`,
  );
  console.log(
    `  Moves:      ${c("cyan", `${parameters.minMoves}-${parameters.maxMoves}`, on)}`,
  );
  console.log(
    `  Downward:   ${c("cyan", parameters.allowDownwardOrSideways ? "allowed" : "no", on)}`,
  );
  console.log(
    `  Finishes:   ${c("cyan", parameters.allowTwoFinishes ? "1-2" : "1", on)}`,
  );
  console.log(c("dim", "─".repeat(40), on));
}

function describeEvent(event: TraceEvent, on: boolean): string {
  switch (event.eventType) {
    case "start":
      return "";
    case "end":
      return c("dim", formatDuration(event.data.durationMs), on);
    case "decision":
      return `${event.data.question} → ${JSON.stringify(event.data.chosen)} ${c("dim", `(${event.data.candidates} candidates, ${event.data.reason})`, on)}`;
    case "warning":
      return c("yellow", event.data.message, on);
  }
}

function printTrace(result: GenerationResult, options: Options): void {
  if (!options.trace || options.quiet) return;

  const on = options.color;
  console.log(c("dim", "\n─── Generation Trace ───", on));
  for (const event of result.trace) {
    const scope = c("blue", `[${event.scope}]`, on);
    const eventType = c("magenta", event.eventType, on);
    console.log(`  ${eventType} ${scope} ${describeEvent(event, on)}`);
  }
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    showHelp();
    return;
  }

  const random = new SeededRandom(options.seed);
  const built = options.randomize
    ? buildGenerationParameters({
        ...randomizeParameters(random),
        ...options.parameters,
      })
    : buildGenerationParameters(options.parameters);

  if (!built.success) {
    console.error(c("red", `✗ ${built.error.message}`, options.color));
    process.exitCode = 1;
    return;
  }
  const parameters = built.value;

  printHeader(options, parameters);

  const board = await loadBoardFile(options.layout);
  const result = generateRoute(board, parameters, {
    random,
    trace: options.trace,
    retries: options.retries,
  });

  printTrace(result, options);

  if (!result.success) {
    console.error(
      c(
        "red",
        `✗ Generation failed after ${result.attempts} attempt(s): ${result.error.message}`,
        options.color,
      ),
    );
    process.exitCode = 1;
    return;
  }

  const score = scoreRoute(result.route);

  if (!options.quiet) {
    console.log(
      `\n${c("green", "✓", options.color)} Generated in ${c("yellow", formatDuration(result.durationMs), options.color)}` +
        ` (${result.route.holds.length} holds, ${result.attempts} attempt(s))\n`,
    );
    printRoute(board, result.route, {
      useColors: options.color,
      showCoordinates: true,
    });
    console.log();
  }

  for (const line of formatScore(score)) {
    console.log(options.quiet ? line : `  ${c("bold", line, options.color)}`);
  }

  if (options.output !== undefined) {
    const json = serializeRoute(result.route).getOrThrow();
    writeFileSync(options.output, `${json}\n`);
    if (!options.quiet) {
      console.log(
        `  ${c("dim", "→", options.color)} Export: ${c("cyan", options.output, options.color)}`,
      );
    }
  }

  if (!options.quiet) {
    console.log();
  }
}

main().catch((error: unknown) => {
  if (RouteSetterError.isRouteSetterError(error)) {
    console.error(`${error.name}: ${error.message}`);
  } else if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
