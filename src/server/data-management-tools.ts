import * as diagnosisTools from "../domain/diagnosis/tools.js";
import type { ToolDefinition } from "./tool-registry.js";
import { catalogNotReadyResponse, formatToolResponse } from "./tool-registry.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "catalog_status",
      description:
        "Report the loaded diagnosis catalog: term count, Macrogrouping/Group/Site counts, rows skipped as malformed, terms without a resolved Site, and load time.",
      inputSchema: {
        type: "object",
        properties: {},
      },
      handler: async (_args, ctx) => {
        if (!ctx.store.isReady()) return catalogNotReadyResponse();
        return formatToolResponse({ ...diagnosisTools.catalogStatus(ctx.pipeline) });
      },
    },
    {
      name: "reload_catalog",
      description:
        "Re-read the diagnosis vocabulary and topography CSV sources and atomically replace the loaded catalog. In-flight searches finish on the old catalog. On failure the old catalog stays in place.",
      inputSchema: {
        type: "object",
        properties: {},
      },
      handler: async (_args, ctx) => {
        const result = await diagnosisTools.reloadCatalog(ctx.loader, ctx.store);
        return formatToolResponse({ ...result });
      },
    },
  ];
}
