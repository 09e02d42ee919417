import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = path.resolve(__dirname, "../..");

export interface CatalogSourceConfig {
  vocabularyPath: string;
  topographyPath: string;
  vocabularyUrl?: string;
  topographyUrl?: string;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface SearchConfig {
  defaultThreshold: number; // 0-100, used when a query omits one
  displayLimit: number; // Max match rows returned for display
  shardSize: number; // Candidates per ranking shard
}

export interface AppConfig {
  sources: CatalogSourceConfig;
  search: SearchConfig;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envFloat(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isFinite);
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envPath(key: string, fallback: string): string {
  const raw = process.env[key]?.trim();
  return path.resolve(PROJECT_ROOT, raw || fallback);
}

function envUrl(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  return raw || undefined;
}

// ============================================================================
// Search Config
// ============================================================================

/**
 * Loads search engine settings from environment variables.
 * Threshold defaults to 80 and the display cap to 500.
 */
export function loadSearchConfig(): SearchConfig {
  return {
    defaultThreshold: envFloat("SEARCH_DEFAULT_THRESHOLD", 80),
    displayLimit: envInt("SEARCH_DISPLAY_LIMIT", 500),
    shardSize: envInt("SEARCH_SHARD_SIZE", 5000),
  };
}

/**
 * Validate search settings at startup.
 * Throws on misconfiguration rather than silently running with broken limits.
 */
export function validateSearchConfig(c: SearchConfig): void {
  const errors: string[] = [];

  if (c.defaultThreshold < 0 || c.defaultThreshold > 100)
    errors.push("defaultThreshold must be between 0 and 100");
  if (c.displayLimit < 1 || c.displayLimit > 5000)
    errors.push("displayLimit must be between 1 and 5000");
  if (c.shardSize < 100) errors.push("shardSize must be >= 100");

  if (errors.length > 0) {
    throw new Error(`Invalid search config:\n  - ${errors.join("\n  - ")}`);
  }
}

// ============================================================================
// Catalog Source Config
// ============================================================================

/**
 * Loads CSV source locations. Relative paths resolve against the project root.
 */
export function loadCatalogSourceConfig(): CatalogSourceConfig {
  return {
    vocabularyPath: envPath("DIAGNOSIS_VOCABULARY_CSV", "data/diagnosis-codes.csv"),
    topographyPath: envPath("DIAGNOSIS_TOPOGRAPHY_CSV", "data/topography.csv"),
    vocabularyUrl: envUrl("DIAGNOSIS_VOCABULARY_URL"),
    topographyUrl: envUrl("DIAGNOSIS_TOPOGRAPHY_URL"),
    maxRetries: Math.max(0, Math.min(10, envInt("SOURCE_MAX_RETRIES", 3))),
    retryBackoffMs: Math.max(100, envInt("SOURCE_RETRY_BACKOFF_MS", 2000)),
  };
}

export function validateCatalogSourceConfig(config: CatalogSourceConfig): void {
  const errors: string[] = [];

  for (const [name, url] of [
    ["vocabularyUrl", config.vocabularyUrl],
    ["topographyUrl", config.topographyUrl],
  ] as const) {
    if (url !== undefined && !url.startsWith("https://")) {
      errors.push(`${name} must start with https://`);
    }
  }
  if (config.retryBackoffMs < 100) {
    errors.push("retryBackoffMs must be >= 100");
  }

  if (errors.length > 0) {
    throw new Error(
      `Invalid catalog source config:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

/**
 * Loads full application config.
 */
export function loadConfig(): AppConfig {
  const search = loadSearchConfig();
  validateSearchConfig(search);
  const sources = loadCatalogSourceConfig();
  validateCatalogSourceConfig(sources);
  return { sources, search };
}
