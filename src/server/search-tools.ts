import * as diagnosisTools from "../domain/diagnosis/tools.js";
import { compactSearchResult } from "./response-formatter.js";
import type { ToolDefinition } from "./tool-registry.js";
import {
  argString,
  argStringOpt,
  argNumber,
  catalogNotReadyResponse,
  formatToolResponse,
} from "./tool-registry.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "search_diagnoses",
      description:
        "Resolve a free-text diagnosis name to standardized codes. Fuzzy, typo-tolerant, word-order-insensitive matching against the diagnosis vocabulary, optionally restricted to a topography Macrogrouping → Group → Site selection. With filters and no query, lists every diagnosis under the selected node. Returns the full id list (ids_csv) plus up to the display limit of ranked matches.",
      inputSchema: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description:
              'Diagnosis text, e.g. "well differentiated liposarcoma". Optional when a filter is given.',
          },
          macro_id: {
            type: "string",
            description: "Macrogrouping id from list_filter_options (level=macro).",
          },
          group_id: {
            type: "string",
            description: "Group id under the selected macro_id.",
          },
          site_id: {
            type: "string",
            description: "Site id under the selected group_id.",
          },
          threshold: {
            type: "number",
            description:
              "Minimum similarity score 0-100 (default 80). Out-of-range values are clamped.",
          },
        },
      },
      handler: async (args, ctx) => {
        if (!ctx.store.isReady()) return catalogNotReadyResponse();

        const result = diagnosisTools.searchDiagnoses(ctx.pipeline, {
          query: argStringOpt(args, "query"),
          macro_id: argStringOpt(args, "macro_id"),
          group_id: argStringOpt(args, "group_id"),
          site_id: argStringOpt(args, "site_id"),
          threshold: argNumber(args, "threshold"),
        });

        if (!result.success || !result.data) return formatToolResponse({ ...result });
        return formatToolResponse({
          success: true,
          data: compactSearchResult(result.data),
          attribution: result.attribution,
        });
      },
    },
    {
      name: "list_filter_options",
      description:
        "List topography filter choices for a cascading picker. level=macro takes no parent; level=group needs a Macrogrouping id as parent_id; level=site needs a Group id. Options come back in source order.",
      inputSchema: {
        type: "object",
        properties: {
          level: {
            type: "string",
            enum: ["macro", "group", "site"],
            description: "Hierarchy level to list.",
          },
          parent_id: {
            type: "string",
            description: "Id of the selected parent node (group and site levels).",
          },
        },
        required: ["level"],
      },
      handler: async (args, ctx) => {
        if (!ctx.store.isReady()) return catalogNotReadyResponse();
        return formatToolResponse({
          ...diagnosisTools.listFilterOptions(ctx.pipeline, {
            level: argString(args, "level"),
            parent_id: argStringOpt(args, "parent_id"),
          }),
        });
      },
    },
    {
      name: "get_diagnosis",
      description:
        "Get one diagnosis entry by id: name, standardized code, topography code and resolved Site.",
      inputSchema: {
        type: "object",
        properties: {
          id: {
            type: "string",
            description: "Diagnosis id as returned by search_diagnoses.",
          },
        },
        required: ["id"],
      },
      handler: async (args, ctx) => {
        if (!ctx.store.isReady()) return catalogNotReadyResponse();
        return formatToolResponse({
          ...diagnosisTools.getDiagnosis(ctx.pipeline, { id: argString(args, "id") }),
        });
      },
    },
  ];
}
