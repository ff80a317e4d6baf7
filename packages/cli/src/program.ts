/**
 * homeindex CLI program definition
 */

import { Command, CommanderError, Option } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  buildNeighborGraph,
  createRandom,
  DEFAULT_NEAREST_COUNT,
  DEFAULT_NEIGHBORS,
  describeIndexes,
  generateFilter,
  logger,
  metrics,
  nearestHomes,
  query,
  resolveSource,
  routeBetween,
  toNearbyResponse,
  toSearchResponse,
  verifyIndexes,
} from "@homeindex/core";
import type {
  FeatureFlag,
  NeighborGraph,
  PredicateValue,
  PropertyFilter,
  ProximitySource,
  QueryMethod,
} from "@homeindex/core";
import { openIndexes } from "./lib/indexes.js";
import { parseCoordinate, parseNonNegativeInt, parseNumber, parseRangeSpec } from "./lib/arg.js";
import {
  colorize,
  printJson,
  printLines,
  renderNearby,
  renderSearch,
  renderStats,
  renderVerification,
} from "./lib/render.js";
import { CliError, formatCliError, mapCoreErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Read the CLI version from package.json
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

type GlobalOptions = {
  data?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export type SearchOptions = {
  bedrooms?: PredicateValue;
  bathrooms?: PredicateValue;
  price?: PredicateValue;
  yearBuilt?: PredicateValue;
  priceMin?: number;
  priceMax?: number;
  basement?: boolean;
  fireplace?: boolean;
  attic?: boolean;
  garage?: boolean;
  method: QueryMethod;
  limit: number;
  json?: boolean;
};

export interface NearestOptions {
  home?: number;
  lat?: number;
  lon?: number;
  k: number;
  count: number;
  to?: number;
  json?: boolean;
}

interface BenchOptions {
  queries: number;
  seed: number;
  json?: boolean;
}

const FEATURE_OPTIONS: ReadonlyArray<["basement" | "fireplace" | "attic" | "garage", FeatureFlag]> = [
  ["basement", "hasBasement"],
  ["fireplace", "hasFireplace"],
  ["attic", "hasAttic"],
  ["garage", "hasGarage"],
];

/**
 * Translate search options into a core filter
 */
export function buildFilter(options: SearchOptions): PropertyFilter {
  const where: Record<string, PredicateValue> = {};

  if (options.bedrooms !== undefined) where.bedrooms = options.bedrooms;
  if (options.bathrooms !== undefined) where.bathrooms = options.bathrooms;
  if (options.yearBuilt !== undefined) where.yearBuilt = options.yearBuilt;

  const hasPriceBounds = options.priceMin !== undefined || options.priceMax !== undefined;
  if (options.price !== undefined && hasPriceBounds) {
    throw new CliError("Use either --price or --price-min/--price-max, not both", { exitCode: 1 });
  }
  if (options.price !== undefined) {
    where.price = options.price;
  } else if (hasPriceBounds) {
    const range: { min?: number; max?: number } = {};
    if (options.priceMin !== undefined) range.min = options.priceMin;
    if (options.priceMax !== undefined) range.max = options.priceMax;
    where.price = range;
  }

  const features = FEATURE_OPTIONS.filter(([option]) => options[option] === true).map(
    ([, flag]) => flag
  );

  return { where, features };
}

/**
 * Pick the proximity source from --home or --lat/--lon. With neither, the first
 * home that has coordinates is used; null when there is none.
 */
export function resolveNearestSource(
  options: NearestOptions,
  graph: NeighborGraph
): ProximitySource | null {
  const hasPoint = options.lat !== undefined || options.lon !== undefined;
  if (options.home !== undefined && hasPoint) {
    throw new CliError("Use either --home or --lat/--lon, not both", { exitCode: 1 });
  }
  if (options.home !== undefined) {
    return options.home;
  }
  if (options.lat !== undefined && options.lon !== undefined) {
    return { latitude: options.lat, longitude: options.lon };
  }
  if (hasPoint) {
    throw new CliError("--lat and --lon must be given together", { exitCode: 1 });
  }
  return graph.nodes[0] ?? null;
}

function mean(samples: readonly number[]): number {
  return samples.length === 0 ? 0 : samples.reduce((sum, ms) => sum + ms, 0) / samples.length;
}

/**
 * Build the commander program. A fresh program is created per invocation.
 */
export function createProgram(): Command {
  const program = new Command();

  // Configure error output with color; commander errors are thrown, not exited
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("homeindex")
    .description("Search real-estate records through two inverted indexes and compare them")
    .version(readVersion())
    .option("--data <path>", "Dataset JSON file")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program.hook("preAction", () => {
    logger.setEnabled(program.opts<GlobalOptions>().verbose === true);
  });

  // Search command
  program
    .command("search")
    .description("Find homes matching every given criterion")
    .option("--bedrooms <spec>", "Bedrooms: 3, 2-4, 2+ or -4", (v) => parseRangeSpec(v, "--bedrooms"))
    .option("--bathrooms <spec>", "Bathrooms (half baths allowed)", (v) => parseRangeSpec(v, "--bathrooms"))
    .option("--price <spec>", "Sale price", (v) => parseRangeSpec(v, "--price"))
    .option("--year-built <spec>", "Year built", (v) => parseRangeSpec(v, "--year-built"))
    .option("--price-min <n>", "Minimum sale price", (v) => parseNumber(v, "--price-min"))
    .option("--price-max <n>", "Maximum sale price", (v) => parseNumber(v, "--price-max"))
    .option("--basement", "Has a basement")
    .option("--fireplace", "Has a fireplace")
    .option("--attic", "Has an attic")
    .option("--garage", "Has a garage")
    .addOption(
      new Option("--method <method>", "Index path(s) to run")
        .choices(["both", "hashset", "posting"])
        .default("both")
    )
    .option("--limit <n>", "Maximum homes to print", (v) => parseNonNegativeInt(v, "--limit"), 50)
    .option("--json", "Output JSON")
    .action(async (options: SearchOptions) => {
      await withTiming("cli.search", async () => {
        const opts = program.opts<GlobalOptions>();
        const filter = buildFilter(options);
        const indexes = await openIndexes(opts.data);

        const result = query(filter, indexes.hashSet, indexes.postingList, {
          method: options.method,
          limit: options.limit,
        });
        const response = toSearchResponse(filter, result, {
          method: options.method,
          limit: options.limit,
        });

        if (options.json) {
          printJson(response);
        } else if (!opts.quiet) {
          printLines(renderSearch(response));
        }
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show index statistics")
    .option("--json", "Output JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.stats", async () => {
        const opts = program.opts<GlobalOptions>();
        const summary = describeIndexes(await openIndexes(opts.data));

        if (options.json) {
          printJson(summary);
        } else if (!opts.quiet) {
          printLines(renderStats(summary));
        }
      });
    });

  // Verify command
  program
    .command("verify")
    .description("Check index invariants and that both indexes agree")
    .option("--json", "Output JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.verify", async () => {
        const opts = program.opts<GlobalOptions>();
        const report = verifyIndexes(await openIndexes(opts.data));

        if (options.json) {
          printJson(report);
        } else if (!opts.quiet) {
          printLines(renderVerification(report));
        }

        if (!report.ok) {
          throw new CliError(`Index verification found ${report.problems.length} problem(s)`, {
            exitCode: 1,
          });
        }
      });
    });

  // Nearest command
  program
    .command("nearest")
    .description("List homes closest to a home or point by path distance over the neighbour graph")
    .option("--home <id>", "Start from this home", (v) =>
      parseNonNegativeInt(v, "--home", Number.MAX_SAFE_INTEGER)
    )
    .option("--lat <degrees>", "Start from the home closest to this point", (v) =>
      parseCoordinate(v, "--lat", 90)
    )
    .option("--lon <degrees>", "Longitude of that point", (v) => parseCoordinate(v, "--lon", 180))
    .option(
      "--k <n>",
      "Neighbours per home in the graph",
      (v) => parseNonNegativeInt(v, "--k", 64),
      DEFAULT_NEIGHBORS
    )
    .option(
      "--count <n>",
      "Homes to list",
      (v) => parseNonNegativeInt(v, "--count", 1000),
      DEFAULT_NEAREST_COUNT
    )
    .option("--to <id>", "Also show the shortest route to this home", (v) =>
      parseNonNegativeInt(v, "--to", Number.MAX_SAFE_INTEGER)
    )
    .option("--json", "Output JSON")
    .action(async (options: NearestOptions) => {
      await withTiming("cli.nearest", async () => {
        const opts = program.opts<GlobalOptions>();
        if (options.k < 1) {
          throw new CliError("--k must be at least 1", { exitCode: 1 });
        }

        const { store } = await openIndexes(opts.data);
        const graph = buildNeighborGraph(store, options.k);
        const source = resolveNearestSource(options, graph);
        const origin = source === null ? null : resolveSource(graph, source);

        const nearest = origin === null ? [] : nearestHomes(graph, origin, options.count);
        const route =
          origin !== null && options.to !== undefined
            ? routeBetween(graph, origin, options.to)
            : undefined;
        const response = toNearbyResponse(graph, origin, nearest, route);

        if (options.json) {
          printJson(response);
        } else if (!opts.quiet) {
          printLines(renderNearby(response));
        }
      });
    });

  // Bench command
  program
    .command("bench")
    .description("Time random filters against both indexes")
    .option("--queries <n>", "Number of random filters", (v) => parseNonNegativeInt(v, "--queries"), 200)
    .option(
      "--seed <n>",
      "Random seed",
      (v) => parseNonNegativeInt(v, "--seed", 0xffffffff),
      1
    )
    .option("--json", "Output JSON")
    .action(async (options: BenchOptions) => {
      await withTiming("cli.bench", async () => {
        const opts = program.opts<GlobalOptions>();
        const indexes = await openIndexes(opts.data);
        const random = createRandom(options.seed);

        const hashSetMs: number[] = [];
        const postingMs: number[] = [];
        let mismatches = 0;

        for (let i = 0; i < options.queries; i++) {
          const result = query(generateFilter(random), indexes.hashSet, indexes.postingList, {
            limit: 0,
            onMismatch: "flag",
          });
          if (result.mismatch) mismatches++;
          if (result.hashSetElapsedMs !== null) hashSetMs.push(result.hashSetElapsedMs);
          if (result.postingListElapsedMs !== null) postingMs.push(result.postingListElapsedMs);
        }

        const report = {
          queries: options.queries,
          seed: options.seed,
          properties: indexes.store.size,
          hashset: { meanMs: mean(hashSetMs), p95Ms: metrics.getP95(hashSetMs) },
          posting: { meanMs: mean(postingMs), p95Ms: metrics.getP95(postingMs) },
          mismatches,
        };

        if (options.json) {
          printJson(report);
        } else if (!opts.quiet) {
          printLines([
            `${report.queries} queries over ${report.properties} properties (seed ${report.seed})`,
            `hashset: mean ${report.hashset.meanMs.toFixed(3)}ms, p95 ${report.hashset.p95Ms.toFixed(3)}ms`,
            `posting: mean ${report.posting.meanMs.toFixed(3)}ms, p95 ${report.posting.p95Ms.toFixed(3)}ms`,
          ]);
        }

        if (mismatches > 0) {
          throw new CliError(`${mismatches} of ${options.queries} queries disagreed between indexes`, {
            exitCode: 3,
          });
        }
      });
    });

  return program;
}

/**
 * Run the CLI and return its exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    // Commander has already written its own message (or help/version output)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose === true)}`);
    return mapCoreErrorToExitCode(err);
  }
}
