import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import {
  loadCatalogSourceConfig,
  loadConfig,
  loadSearchConfig,
  validateCatalogSourceConfig,
  validateSearchConfig,
  type CatalogSourceConfig,
} from "../src/core/config.js";
import { makeSearchConfig } from "./fixtures.js";

const ENV_KEYS = [
  "SEARCH_DEFAULT_THRESHOLD",
  "SEARCH_DISPLAY_LIMIT",
  "SEARCH_SHARD_SIZE",
  "DIAGNOSIS_VOCABULARY_CSV",
  "DIAGNOSIS_TOPOGRAPHY_CSV",
  "DIAGNOSIS_VOCABULARY_URL",
  "DIAGNOSIS_TOPOGRAPHY_URL",
  "SOURCE_MAX_RETRIES",
  "SOURCE_RETRY_BACKOFF_MS",
];
const saved: Record<string, string | undefined> = {};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    if (saved[key] === undefined) delete process.env[key];
    else process.env[key] = saved[key];
  }
});

function makeSourceConfig(overrides?: Partial<CatalogSourceConfig>): CatalogSourceConfig {
  return {
    vocabularyPath: "/data/vocabulary.csv",
    topographyPath: "/data/topography.csv",
    maxRetries: 3,
    retryBackoffMs: 2000,
    ...overrides,
  };
}

// ============================================================================
// Search config
// ============================================================================

describe("loadSearchConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadSearchConfig()).toEqual({
      defaultThreshold: 80,
      displayLimit: 500,
      shardSize: 5000,
    });
  });

  it("reads overrides from the environment", () => {
    process.env.SEARCH_DEFAULT_THRESHOLD = "65.5";
    process.env.SEARCH_DISPLAY_LIMIT = "100";
    process.env.SEARCH_SHARD_SIZE = "2000";
    expect(loadSearchConfig()).toEqual({
      defaultThreshold: 65.5,
      displayLimit: 100,
      shardSize: 2000,
    });
  });

  it("falls back on unparseable values", () => {
    process.env.SEARCH_DEFAULT_THRESHOLD = "high";
    process.env.SEARCH_DISPLAY_LIMIT = "2.5";
    process.env.SEARCH_SHARD_SIZE = "   ";
    expect(loadSearchConfig()).toEqual({
      defaultThreshold: 80,
      displayLimit: 500,
      shardSize: 5000,
    });
  });
});

describe("validateSearchConfig", () => {
  it("accepts the defaults", () => {
    expect(() => validateSearchConfig(makeSearchConfig())).not.toThrow();
  });

  it("rejects a threshold outside 0-100", () => {
    expect(() => validateSearchConfig(makeSearchConfig({ defaultThreshold: 120 }))).toThrow(
      /defaultThreshold must be between 0 and 100/,
    );
    expect(() => validateSearchConfig(makeSearchConfig({ defaultThreshold: -1 }))).toThrow(
      /defaultThreshold/,
    );
  });

  it("rejects a display limit outside 1-5000", () => {
    expect(() => validateSearchConfig(makeSearchConfig({ displayLimit: 0 }))).toThrow(
      /displayLimit/,
    );
  });

  it("reports multiple errors at once", () => {
    let message = "";
    try {
      validateSearchConfig(makeSearchConfig({ defaultThreshold: 101, shardSize: 10 }));
    } catch (e) {
      message = e instanceof Error ? e.message : "";
    }
    expect(message).toBe(
      "Invalid search config:\n  - defaultThreshold must be between 0 and 100\n  - shardSize must be >= 100",
    );
  });
});

// ============================================================================
// Catalog source config
// ============================================================================

describe("loadCatalogSourceConfig", () => {
  it("resolves default paths under the project data directory", () => {
    const config = loadCatalogSourceConfig();
    expect(config.vocabularyPath.endsWith(path.join("data", "diagnosis-codes.csv"))).toBe(true);
    expect(config.topographyPath.endsWith(path.join("data", "topography.csv"))).toBe(true);
    expect(path.isAbsolute(config.vocabularyPath)).toBe(true);
    expect(config.vocabularyUrl).toBeUndefined();
    expect(config.maxRetries).toBe(3);
    expect(config.retryBackoffMs).toBe(2000);
  });

  it("keeps absolute paths as given", () => {
    process.env.DIAGNOSIS_VOCABULARY_CSV = "/srv/catalog/codes.csv";
    expect(loadCatalogSourceConfig().vocabularyPath).toBe("/srv/catalog/codes.csv");
  });

  it("treats blank URLs as unset", () => {
    process.env.DIAGNOSIS_TOPOGRAPHY_URL = "   ";
    expect(loadCatalogSourceConfig().topographyUrl).toBeUndefined();
  });

  it("clamps retry settings", () => {
    process.env.SOURCE_MAX_RETRIES = "50";
    process.env.SOURCE_RETRY_BACKOFF_MS = "10";
    const config = loadCatalogSourceConfig();
    expect(config.maxRetries).toBe(10);
    expect(config.retryBackoffMs).toBe(100);

    process.env.SOURCE_MAX_RETRIES = "-3";
    expect(loadCatalogSourceConfig().maxRetries).toBe(0);
  });
});

describe("validateCatalogSourceConfig", () => {
  it("accepts https URLs", () => {
    expect(() =>
      validateCatalogSourceConfig(
        makeSourceConfig({ vocabularyUrl: "https://example.test/codes.csv" }),
      ),
    ).not.toThrow();
  });

  it("rejects non-https URLs", () => {
    expect(() =>
      validateCatalogSourceConfig(
        makeSourceConfig({ topographyUrl: "http://example.test/topography.csv" }),
      ),
    ).toThrow("Invalid catalog source config:\n  - topographyUrl must start with https://");
  });

  it("rejects a backoff under 100ms", () => {
    expect(() =>
      validateCatalogSourceConfig(makeSourceConfig({ retryBackoffMs: 5 })),
    ).toThrow(/retryBackoffMs must be >= 100/);
  });
});

describe("loadConfig", () => {
  it("loads and validates both sections", () => {
    const config = loadConfig();
    expect(config.search.defaultThreshold).toBe(80);
    expect(config.sources.maxRetries).toBe(3);
  });

  it("throws on an invalid environment", () => {
    process.env.SEARCH_DEFAULT_THRESHOLD = "150";
    expect(() => loadConfig()).toThrow(/Invalid search config/);
  });
});
