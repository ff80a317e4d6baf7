/**
 * Validation utilities for property records
 */

import { InvalidPropertyError } from "./errors.js";
import type { FeatureFlag, PropertyInput } from "./types.js";

/**
 * Plausible construction years
 */
export const MIN_YEAR_BUILT = 1700;
export const MAX_YEAR_BUILT = 2100;

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validate a typed property record
 * @param input - Record to validate
 * @param position - Position in the dataset, for error messages
 * @throws InvalidPropertyError if any field is out of range
 */
export function validateProperty(input: PropertyInput, position: number): void {
  if (!isNonNegativeInteger(input.bedrooms)) {
    throw new InvalidPropertyError(position, `bedrooms must be a non-negative integer, got ${input.bedrooms}`);
  }

  if (!(input.bathrooms >= 0) || !Number.isInteger(input.bathrooms * 2)) {
    throw new InvalidPropertyError(
      position,
      `bathrooms must be a non-negative multiple of 0.5, got ${input.bathrooms}`
    );
  }

  if (!Number.isInteger(input.price) || input.price <= 0) {
    throw new InvalidPropertyError(position, `price must be a positive integer, got ${input.price}`);
  }

  if (
    !Number.isInteger(input.yearBuilt) ||
    input.yearBuilt < MIN_YEAR_BUILT ||
    input.yearBuilt > MAX_YEAR_BUILT
  ) {
    throw new InvalidPropertyError(
      position,
      `yearBuilt must be an integer between ${MIN_YEAR_BUILT} and ${MAX_YEAR_BUILT}, got ${input.yearBuilt}`
    );
  }

  if (input.latitude !== null && !(Math.abs(input.latitude) <= 90)) {
    throw new InvalidPropertyError(position, `latitude out of range: ${input.latitude}`);
  }

  if (input.longitude !== null && !(Math.abs(input.longitude) <= 180)) {
    throw new InvalidPropertyError(position, `longitude out of range: ${input.longitude}`);
  }

  if (input.buildingSqft !== undefined && !(input.buildingSqft >= 0)) {
    throw new InvalidPropertyError(position, `buildingSqft must be non-negative, got ${input.buildingSqft}`);
  }
}

function readNumber(raw: Record<string, unknown>, field: string, position: number): number {
  const value = raw[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidPropertyError(position, `${field} must be a number`);
  }
  return value;
}

function readCoordinate(raw: Record<string, unknown>, field: string, position: number): number | null {
  const value = raw[field];
  if (value === undefined || value === null) {
    return null;
  }
  return readNumber(raw, field, position);
}

function readFlag(raw: Record<string, unknown>, field: FeatureFlag, position: number): boolean {
  const value = raw[field];
  if (value === undefined) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw new InvalidPropertyError(position, `${field} must be a boolean`);
  }
  return value;
}

/**
 * Turn an untyped dataset record into a validated PropertyInput.
 * Missing feature flags default to false; missing coordinates to null.
 * Any `id` on the raw record is ignored: ids are assigned by position.
 */
export function parsePropertyRecord(raw: unknown, position: number): PropertyInput {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new InvalidPropertyError(position, "record must be an object");
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const input: PropertyInput = {
    bedrooms: readNumber(record, "bedrooms", position),
    bathrooms: readNumber(record, "bathrooms", position),
    price: readNumber(record, "price", position),
    yearBuilt: readNumber(record, "yearBuilt", position),
    latitude: readCoordinate(record, "latitude", position),
    longitude: readCoordinate(record, "longitude", position),
    hasBasement: readFlag(record, "hasBasement", position),
    hasFireplace: readFlag(record, "hasFireplace", position),
    hasAttic: readFlag(record, "hasAttic", position),
    hasGarage: readFlag(record, "hasGarage", position),
  };

  if (typeof record.address === "string") {
    input.address = record.address;
  }
  if (record.buildingSqft !== undefined) {
    input.buildingSqft = readNumber(record, "buildingSqft", position);
  }

  validateProperty(input, position);
  return input;
}
