/**
 * MCP tool implementations for home search
 * Each tool returns a short text summary followed by the JSON payload as text
 */

import {
  HealthInputSchema,
  IndexStatsInputSchema,
  MAX_LIMIT,
  MAX_NEAREST_COUNT,
  MAX_NEIGHBORS,
  NearestHomesInputSchema,
  SearchHomesInputSchema,
} from "./schemas.js";
import type { HealthReport, HomeSearchService } from "./service/home-search.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution, toolUsage } from "./observability/metrics.js";
import type { ToolUsage } from "./observability/metrics.js";
import { errorCode } from "./errors.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
};

export type ToolName = "search_homes" | "nearest_homes" | "index_stats" | "health";

export type HealthPayload = HealthReport & { tools: Record<string, ToolUsage> };

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

// Helper to wrap tool execution with logging and metrics
async function executeTool<T>(toolName: ToolName, handler: () => T | Promise<T>): Promise<T> {
  const startTime = performance.now();
  let success = false;
  let error: unknown;

  try {
    const result = await handler();
    success = true;
    return result;
  } catch (err) {
    error = err;
    throw err;
  } finally {
    const duration = performance.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, success ? undefined : errorCode(error));
  }
}

function toolResult(summary: string, payload: unknown): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
  };
}

/**
 * Bind tool handlers to a loaded service
 */
export function createToolHandlers(service: HomeSearchService): Record<ToolName, ToolHandler> {
  return {
    search_homes: (args) =>
      executeTool("search_homes", () => {
        const input = SearchHomesInputSchema.parse(args ?? {});
        const response = service.search(input);
        const shown = response.homes.length;
        const summary =
          shown < response.total
            ? `Found ${response.total} matching homes (showing ${shown})`
            : `Found ${response.total} matching homes`;
        return toolResult(summary, response);
      }),

    nearest_homes: (args) =>
      executeTool("nearest_homes", () => {
        const input = NearestHomesInputSchema.parse(args ?? {});
        const response = service.nearest(input);
        const summary =
          response.source === null
            ? "No homes with coordinates"
            : `Found ${response.homes.length} homes near #${response.source.id}`;
        return toolResult(summary, response);
      }),

    index_stats: (args) =>
      executeTool("index_stats", () => {
        IndexStatsInputSchema.parse(args ?? {});
        const summary = service.stats();
        return toolResult(`Indexes cover ${summary.properties} properties`, summary);
      }),

    health: (args) =>
      executeTool("health", () => {
        HealthInputSchema.parse(args ?? {});
        const report: HealthPayload = {
          ...service.health(),
          tools: toolUsage(toolDefinitions.map((tool) => tool.name)),
        };
        return toolResult(`Status: ${report.status}`, report);
      }),
  };
}

export function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((tool) => tool.name === name);
}

const rangeOrValue = {
  description: "Exact value, or an inclusive range object { min, max } with at least one bound",
  oneOf: [
    { type: "number" },
    {
      type: "object",
      properties: { min: { type: "number" }, max: { type: "number" } },
      additionalProperties: false,
    },
  ],
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions = [
  {
    name: "search_homes",
    description:
      "Find homes matching every criterion through both inverted indexes and compare their timings",
    inputSchema: {
      type: "object",
      properties: {
        where: {
          type: "object",
          description:
            "Attribute predicates: bedrooms, bathrooms, price, yearBuilt, or a feature flag set to true/false",
          properties: {
            bedrooms: rangeOrValue,
            bathrooms: rangeOrValue,
            price: rangeOrValue,
            yearBuilt: rangeOrValue,
          },
        },
        features: {
          type: "array",
          items: {
            type: "string",
            enum: ["hasBasement", "hasFireplace", "hasAttic", "hasGarage"],
          },
          description: "Feature flags that must all be present",
        },
        method: {
          type: "string",
          enum: ["both", "hashset", "posting"],
          description: "Index path(s) to run (default both)",
        },
        limit: {
          type: "number",
          description: `Maximum homes returned (max ${MAX_LIMIT}, default 50); total is never capped`,
        },
        onMismatch: {
          type: "string",
          enum: ["throw", "flag"],
          description: "When both paths disagree: fail the call (default) or return the intersection with a report",
        },
      },
    },
  },
  {
    name: "nearest_homes",
    description:
      "List homes closest to a home or point by shortest path over a k-nearest-neighbour graph of great-circle distances",
    inputSchema: {
      type: "object",
      properties: {
        home: {
          type: "number",
          description: "Start from this home id (default: the first home with coordinates)",
        },
        latitude: { type: "number", description: "Start from the home closest to this point" },
        longitude: { type: "number", description: "Longitude of that point" },
        count: {
          type: "number",
          description: `Homes to return, source first (max ${MAX_NEAREST_COUNT}, default 10)`,
        },
        k: {
          type: "number",
          description: `Neighbours per home in the graph (max ${MAX_NEIGHBORS}, default 8)`,
        },
        target: {
          type: "number",
          description: "Also return the shortest route from the source to this home",
        },
      },
    },
  },
  {
    name: "index_stats",
    description: "Describe both indexes: keys, postings and per-attribute key ranges",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "health",
    description: "Report whether the indexes are loaded and whether any mismatch has been seen",
    inputSchema: { type: "object", properties: {} },
  },
] as const;
