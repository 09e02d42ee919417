import { InvalidFilterSelectionError } from "../../core/errors.js";
import type { TopographyIndex } from "../../data-sources/topography-index.js";
import type { FilterLevel, FilterNode, QuerySpec } from "./types.js";

export type SelectionState =
  | { kind: "none" }
  | { kind: "macro"; macroId: string }
  | { kind: "group"; macroId: string; groupId: string; siteId: string | null };

/**
 * Cascading Macrogrouping → Group → Site selection.
 *
 * Immutable: every transition returns a new selection. Selecting a level
 * drops whatever was selected below it, and a level can only be selected
 * once its parent is.
 */
export class FilterSelection {
  private readonly index: TopographyIndex;
  readonly state: SelectionState;

  private constructor(index: TopographyIndex, state: SelectionState) {
    this.index = index;
    this.state = state;
  }

  static empty(index: TopographyIndex): FilterSelection {
    return new FilterSelection(index, { kind: "none" });
  }

  selectMacro(macroId: string): FilterSelection {
    this.requireNode(macroId, "macro", null);
    return new FilterSelection(this.index, { kind: "macro", macroId });
  }

  selectGroup(groupId: string): FilterSelection {
    if (this.state.kind === "none") {
      throw new InvalidFilterSelectionError(
        `Group "${groupId}" selected without a Macrogrouping`,
      );
    }
    const { macroId } = this.state;
    this.requireNode(groupId, "group", macroId);
    return new FilterSelection(this.index, {
      kind: "group",
      macroId,
      groupId,
      siteId: null,
    });
  }

  selectSite(siteId: string): FilterSelection {
    if (this.state.kind !== "group") {
      throw new InvalidFilterSelectionError(
        `Site "${siteId}" selected without a Group`,
      );
    }
    this.requireNode(siteId, "site", this.state.groupId);
    return new FilterSelection(this.index, { ...this.state, siteId });
  }

  clear(): FilterSelection {
    return FilterSelection.empty(this.index);
  }

  /** Choices available at a level given the current selection. */
  options(level: FilterLevel): FilterNode[] {
    switch (level) {
      case "macro":
        return this.index.roots();
      case "group":
        if (this.state.kind === "none") {
          throw new InvalidFilterSelectionError(
            "Group options need a selected Macrogrouping",
          );
        }
        return this.index.childrenOf(this.state.macroId);
      case "site":
        if (this.state.kind !== "group") {
          throw new InvalidFilterSelectionError("Site options need a selected Group");
        }
        return this.index.childrenOf(this.state.groupId);
    }
  }

  /** The deepest selected node, or null with no filter. */
  mostSpecificNodeId(): string | null {
    switch (this.state.kind) {
      case "none":
        return null;
      case "macro":
        return this.state.macroId;
      case "group":
        return this.state.siteId ?? this.state.groupId;
    }
  }

  /** Selected node ids, most general first. */
  selectedIds(): string[] {
    switch (this.state.kind) {
      case "none":
        return [];
      case "macro":
        return [this.state.macroId];
      case "group":
        return this.state.siteId === null
          ? [this.state.macroId, this.state.groupId]
          : [this.state.macroId, this.state.groupId, this.state.siteId];
    }
  }

  toQuerySpec(text?: string, threshold?: number): QuerySpec {
    const spec: QuerySpec = { text, threshold };
    if (this.state.kind !== "none") spec.macroId = this.state.macroId;
    if (this.state.kind === "group") {
      spec.groupId = this.state.groupId;
      if (this.state.siteId !== null) spec.siteId = this.state.siteId;
    }
    return spec;
  }

  private requireNode(
    nodeId: string,
    level: FilterLevel,
    parentId: string | null,
  ): FilterNode {
    const node = this.index.getNode(nodeId);
    if (!node) {
      throw new InvalidFilterSelectionError(`Unknown ${level} "${nodeId}"`);
    }
    if (node.level !== level) {
      throw new InvalidFilterSelectionError(
        `"${nodeId}" is a ${node.level}, not a ${level}`,
      );
    }
    if (node.parentId !== parentId) {
      throw new InvalidFilterSelectionError(
        `${level} "${nodeId}" does not belong to "${parentId}"`,
      );
    }
    return node;
  }
}
