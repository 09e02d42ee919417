import { loadConfig, type AppConfig } from "../core/config.js";
import { CsvCatalogLoader } from "../data-sources/catalog-loader.js";
import { CatalogStore, buildCatalogSnapshot } from "../data-sources/catalog-store.js";
import { DiagnosisSearchPipeline } from "../domain/diagnosis/search-pipeline.js";
import { logInfo, logError, getErrorMessage } from "../core/logging.js";

export interface ServerContext {
  config: AppConfig;
  loader: CsvCatalogLoader;
  store: CatalogStore;
  pipeline: DiagnosisSearchPipeline;
}

/**
 * Create and initialize the full server context.
 * All instantiation + async init happens here (not at module import time).
 */
export async function createServerContext(
  config: AppConfig = loadConfig(),
): Promise<ServerContext> {
  const loader = new CsvCatalogLoader(config.sources);
  const store = new CatalogStore();
  const pipeline = new DiagnosisSearchPipeline(store, config.search);

  // Initial catalog load. A failure leaves the server up without a catalog;
  // reload_catalog can publish one later.
  try {
    store.replace(buildCatalogSnapshot(await loader.load()));
    const { report } = store.current();
    logInfo(
      `Diagnosis catalog ready: ${report.vocabularyRows} terms, ${report.unresolvedTerms} without a topography site`,
    );
  } catch (err) {
    logError("Diagnosis catalog initialization failed:", getErrorMessage(err));
  }

  return { config, loader, store, pipeline };
}
