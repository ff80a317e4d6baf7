/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { PredicateValue } from "@homeindex/core";

const NUMBER = String.raw`\d+(?:\.\d+)?`;
const EXACT = new RegExp(`^(${NUMBER})$`);
const BETWEEN = new RegExp(`^(${NUMBER})-(${NUMBER})$`);
const AT_LEAST = new RegExp(`^(${NUMBER})\\+$`);
const AT_MOST = new RegExp(`^-(${NUMBER})$`);
const SIGNED = new RegExp(`^-?${NUMBER}$`);

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 10000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway work
  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a non-negative decimal argument
 */
export function parseNumber(value: string, name: string): number {
  const trimmed = value.trim();
  if (!EXACT.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative number`);
  }
  return Number(trimmed);
}

/**
 * Parse a signed decimal degree within [-limit, limit]
 */
export function parseCoordinate(value: string, name: string, limit: number): number {
  const trimmed = value.trim();
  if (!SIGNED.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a decimal number of degrees`);
  }
  const parsed = Number(trimmed);
  if (Math.abs(parsed) > limit) {
    throw new InvalidArgumentError(`${name} must be between -${limit} and ${limit}`);
  }
  return parsed;
}

/**
 * Parse a range spec:
 * - "3"       exactly 3
 * - "2-4"     2 through 4 inclusive
 * - "2+"      at least 2
 * - "-500000" at most 500000
 */
export function parseRangeSpec(value: string, name: string): PredicateValue {
  const trimmed = value.trim().replace(/_/g, "");

  let match = EXACT.exec(trimmed);
  if (match) {
    return Number(match[1]);
  }

  match = BETWEEN.exec(trimmed);
  if (match) {
    return { min: Number(match[1]), max: Number(match[2]) };
  }

  match = AT_LEAST.exec(trimmed);
  if (match) {
    return { min: Number(match[1]) };
  }

  match = AT_MOST.exec(trimmed);
  if (match) {
    return { max: Number(match[1]) };
  }

  throw new InvalidArgumentError(`${name} must look like 3, 2-4, 2+ or -4 (got "${value}")`);
}
