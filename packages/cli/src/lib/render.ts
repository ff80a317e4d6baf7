/**
 * Output rendering helpers
 */

import type {
  IndexSetSummary,
  NearbyResponse,
  SearchResponse,
  VerificationReport,
} from "@homeindex/core";

type Color = "red" | "green" | "yellow";

/**
 * Print indented JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Write raw text to stderr
 */
export function writeStderr(text: string): void {
  process.stderr.write(text);
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

function formatPrice(price: number): string {
  return `$${price.toLocaleString("en-US")}`;
}

/**
 * Human-readable search summary: per-method timing, then one line per home
 */
export function renderSearch(response: SearchResponse): string[] {
  const lines: string[] = [];
  const { hashset, posting, mismatch } = response.performance;

  if (hashset) lines.push(`hashset: ${hashset.count} matches in ${hashset.timeMs.toFixed(3)}ms`);
  if (posting) lines.push(`posting: ${posting.count} matches in ${posting.timeMs.toFixed(3)}ms`);
  if (mismatch) {
    lines.push(
      colorize(
        `mismatch: ${mismatch.onlyInHashSet.length} only in hashset, ${mismatch.onlyInPostingList.length} only in posting`,
        "yellow"
      )
    );
  }

  const shown = response.homes.length;
  lines.push(
    shown < response.total ? `${response.total} homes (showing ${shown})` : `${response.total} homes`
  );

  for (const home of response.homes) {
    const features = Object.entries(home.features)
      .filter(([, present]) => present)
      .map(([name]) => name);
    lines.push(
      `  #${home.id} ${home.bedrooms} bd / ${home.bathrooms} ba, ${formatPrice(home.price)}, built ${home.yearBuilt}` +
        (features.length > 0 ? ` [${features.join(", ")}]` : "") +
        (home.address ? ` ${home.address}` : "")
    );
  }

  return lines;
}

/**
 * Nearest homes by path distance, then the route when one was asked for
 */
export function renderNearby(response: NearbyResponse): string[] {
  if (response.source === null) {
    return ["No homes with coordinates"];
  }

  const lines = [
    `${response.homes.length} nearest homes to #${response.source.id} (k=${response.k})`,
    ...response.homes.map(
      (home) =>
        `  #${home.id} ${home.distanceKm.toFixed(3)} km` + (home.address ? ` ${home.address}` : "")
    ),
  ];

  const { route } = response;
  if (route) {
    lines.push(
      route.distanceKm === null
        ? colorize(`No route to #${route.to}`, "yellow")
        : `Route to #${route.to}: ${route.ids.join(" -> ")} (${route.distanceKm.toFixed(3)} km)`
    );
  }

  return lines;
}

/**
 * Human-readable index summaries
 */
export function renderStats(summary: IndexSetSummary): string[] {
  const lines = [
    `Properties: ${summary.properties}`,
    `Buckets: price ${summary.options.priceBucketSize}, yearBuilt ${summary.options.yearBucketSize}`,
  ];

  for (const index of [summary.hashSet, summary.postingList]) {
    lines.push(`${index.kind}: ${index.postingKeys} keys, ${index.postings} postings`);
    for (const attribute of index.attributes) {
      const range =
        attribute.minKey === null ? "empty" : `keys ${attribute.minKey}..${attribute.maxKey}`;
      lines.push(
        `  ${attribute.attribute}: ${attribute.distinctKeys} distinct, ${range}, largest ${attribute.largestPosting}`
      );
    }
  }

  return lines;
}

export function renderVerification(report: VerificationReport): string[] {
  if (report.ok) {
    return [colorize("OK: indexes are consistent", "green")];
  }
  return [
    colorize(`FAILED: ${report.problems.length} problem(s)`, "red"),
    ...report.problems.map((problem) => `  ${problem}`),
  ];
}
