/**
 * Unit tests for dataset loading
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { DatasetReadError, InvalidPropertyError } from "./errors.js";
import { loadProperties } from "./io.js";

const record = {
  bedrooms: 3,
  bathrooms: 2,
  price: 275_000,
  yearBuilt: 1984,
  latitude: 44.9,
  longitude: -93.2,
  hasBasement: true,
  hasFireplace: true,
  hasAttic: false,
  hasGarage: true,
};

describe("loadProperties", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), "homeindex-io-"));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function writeDataset(content: string): Promise<string> {
    const file = path.join(testDir, "properties.json");
    await fs.writeFile(file, content, "utf-8");
    return file;
  }

  it("should load a bare array of records", async () => {
    const file = await writeDataset(JSON.stringify([record, { ...record, bedrooms: 5 }]));
    const properties = await loadProperties(file);

    expect(properties).toHaveLength(2);
    expect(properties[1].bedrooms).toBe(5);
  });

  it("should load records wrapped in a properties field", async () => {
    const file = await writeDataset(JSON.stringify({ properties: [record] }));
    expect(await loadProperties(file)).toEqual([record]);
  });

  it("should report a missing file as not found", async () => {
    const file = path.join(testDir, "missing.json");
    const error = await loadProperties(file).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DatasetReadError);
    expect(error).toMatchObject({ code: "DATASET_READ_ERROR", notFound: true, filePath: file });
  });

  it("should reject malformed JSON", async () => {
    const file = await writeDataset("{ not json");
    await expect(loadProperties(file)).rejects.toMatchObject({
      code: "DATASET_READ_ERROR",
      notFound: false,
    });
  });

  it("should reject a top-level value that holds no records", async () => {
    const file = await writeDataset(JSON.stringify({ homes: [] }));
    await expect(loadProperties(file)).rejects.toBeInstanceOf(DatasetReadError);
  });

  it("should reject the first invalid record", async () => {
    const file = await writeDataset(JSON.stringify([record, { ...record, bathrooms: -1 }]));
    await expect(loadProperties(file)).rejects.toBeInstanceOf(InvalidPropertyError);
  });
});
