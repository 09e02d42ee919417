import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import axios from "axios";
import { parse } from "csv-parse/sync";
import {
  logInfo,
  logWarn,
  getErrorMessage,
} from "../core/logging.js";
import type { CatalogSourceConfig } from "../core/config.js";
import type { CatalogInput } from "./catalog-store.js";
import type {
  TopographyRow,
  VocabularyRow,
} from "../domain/diagnosis/types.js";

const MAX_DOWNLOAD_BYTES = 50 * 1024 * 1024; // 50MB safety cap

// Accepted header names per field (matched case-insensitively, first hit wins)
const VOCABULARY_COLUMNS = {
  id: ["id", "diagnosis_id"],
  name: ["name", "diagnosis", "diagnosis_name"],
  code: ["code", "diagnosis_code"],
  topography: ["topography_code", "topography", "topo"],
};

const TOPOGRAPHY_COLUMNS = {
  codes: ["icd-o-3", "icdo3", "codes", "topography_code"],
  site: ["site"],
  group: ["group"],
  macro: ["macrogrouping", "macro"],
};

export interface ParsedCsv<T> {
  rows: T[];
  skipped: number;
}

function readRecords(content: string): Record<string, string>[] {
  return parse(content, {
    columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  }) as Record<string, string>[];
}

function pick(record: Record<string, string>, aliases: readonly string[]): string {
  for (const alias of aliases) {
    const value = record[alias];
    if (value !== undefined && value.trim() !== "") return value.trim();
  }
  return "";
}

/**
 * Validate vocabulary CSV rows. Rows missing id, name or code, and rows
 * repeating an id already accepted, are skipped and counted.
 */
export function parseVocabularyCsv(content: string): ParsedCsv<VocabularyRow> {
  const rows: VocabularyRow[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const record of readRecords(content)) {
    const id = pick(record, VOCABULARY_COLUMNS.id);
    const name = pick(record, VOCABULARY_COLUMNS.name);
    const code = pick(record, VOCABULARY_COLUMNS.code);

    if (!id || !name || !code || seen.has(id)) {
      skipped++;
      continue;
    }

    seen.add(id);
    rows.push({
      id,
      name,
      code,
      topographyCode: pick(record, VOCABULARY_COLUMNS.topography).toUpperCase(),
    });
  }

  return { rows, skipped };
}

/**
 * Validate topography CSV rows. Rows missing any hierarchy level or the
 * ICD-O-3 code expression are skipped and counted.
 */
export function parseTopographyCsv(content: string): ParsedCsv<TopographyRow> {
  const rows: TopographyRow[] = [];
  let skipped = 0;

  for (const record of readRecords(content)) {
    const row: TopographyRow = {
      macroName: pick(record, TOPOGRAPHY_COLUMNS.macro),
      groupName: pick(record, TOPOGRAPHY_COLUMNS.group),
      siteName: pick(record, TOPOGRAPHY_COLUMNS.site),
      codes: pick(record, TOPOGRAPHY_COLUMNS.codes),
    };

    if (!row.macroName || !row.groupName || !row.siteName || !row.codes) {
      skipped++;
      continue;
    }
    rows.push(row);
  }

  return { rows, skipped };
}

/**
 * Reads the vocabulary and topography CSVs from disk, downloading a file
 * first when it is missing and a source URL is configured.
 */
export class CsvCatalogLoader {
  private config: CatalogSourceConfig;

  constructor(config: CatalogSourceConfig) {
    this.config = config;
  }

  async loadVocabulary(): Promise<ParsedCsv<VocabularyRow>> {
    return parseVocabularyCsv(
      await this.readSource(this.config.vocabularyPath, this.config.vocabularyUrl),
    );
  }

  async loadTopography(): Promise<ParsedCsv<TopographyRow>> {
    return parseTopographyCsv(
      await this.readSource(this.config.topographyPath, this.config.topographyUrl),
    );
  }

  /** Both sources, validated and ready for buildCatalogSnapshot. */
  async load(): Promise<CatalogInput> {
    const [vocabulary, topography] = await Promise.all([
      this.loadVocabulary(),
      this.loadTopography(),
    ]);

    if (vocabulary.rows.length === 0) {
      throw new Error(
        `Vocabulary loaded 0 entries from ${this.config.vocabularyPath} — CSV may be malformed or empty`,
      );
    }
    if (vocabulary.skipped > 0 || topography.skipped > 0) {
      logWarn(
        `Skipped malformed rows: ${vocabulary.skipped} vocabulary, ${topography.skipped} topography`,
      );
    }
    if (topography.rows.length === 0) {
      logWarn("Topography loaded 0 entries — filters will have no options");
    }

    logInfo(
      `Catalog sources read: ${vocabulary.rows.length} terms, ${topography.rows.length} topography rows`,
    );

    return {
      vocabulary: vocabulary.rows,
      topography: topography.rows,
      skippedVocabularyRows: vocabulary.skipped,
      skippedTopographyRows: topography.skipped,
    };
  }

  private async readSource(filePath: string, url: string | undefined): Promise<string> {
    if (!fs.existsSync(filePath)) {
      if (!url) {
        throw new Error(`Catalog source not found: ${filePath}`);
      }
      await this.download(url, filePath);
    }
    return fsp.readFile(filePath, "utf-8");
  }

  private async download(url: string, filePath: string): Promise<void> {
    logInfo(`Downloading catalog source: ${url}`);
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    const body = await this.fetchWithRetry(url);
    await fsp.writeFile(filePath, body);
    logInfo(`Catalog source saved to ${filePath}`);
  }

  private async fetchWithRetry(url: string): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        const response = await axios.get<string>(url, {
          responseType: "text",
          timeout: 60_000,
          maxContentLength: MAX_DOWNLOAD_BYTES,
          maxBodyLength: MAX_DOWNLOAD_BYTES,
        });
        return response.data;
      } catch (error: unknown) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const msg = getErrorMessage(error);

        const isRetryable =
          msg.includes("429") ||
          msg.includes("500") ||
          msg.includes("502") ||
          msg.includes("503") ||
          msg.includes("ECONNRESET") ||
          msg.includes("timeout");

        if (!isRetryable || attempt === this.config.maxRetries) {
          break;
        }

        const backoffMs = this.config.retryBackoffMs * Math.pow(2, attempt);
        logWarn(
          `Retry ${attempt + 1}/${this.config.maxRetries} for ${url} in ${backoffMs}ms: ${msg}`,
        );
        await new Promise<void>((r) => setTimeout(r, backoffMs));
      }
    }

    throw new Error(
      `Failed to download catalog source ${url}: ${lastError ? lastError.message : "unknown error"}`,
    );
  }
}
