import { normalize } from "../domain/diagnosis/normalizer.js";
import {
  expandTopographyCode,
  matchesTopographyCode,
  type TopographyCodeRule,
} from "../domain/diagnosis/topography-codes.js";
import type {
  FilterLevel,
  FilterNode,
  Term,
  TopographyRow,
  VocabularyRow,
} from "../domain/diagnosis/types.js";

export const ID_SEPARATOR = "::";
const ROOT_KEY = "";

const EMPTY_IDS: ReadonlySet<string> = new Set();

export interface TopographyBuild {
  index: TopographyIndex;
  terms: Term[]; // Vocabulary order, each linked to its Site (or null)
  unresolvedTerms: number;
  rejectedRows: number; // Rows whose names contain ID_SEPARATOR
}

interface SiteRule {
  siteId: string;
  rules: TopographyCodeRule[];
}

/**
 * Immutable Macrogrouping → Group → Site hierarchy plus the term membership
 * of every node. Built once per catalog load; never mutated afterwards.
 */
export class TopographyIndex {
  private readonly nodes: ReadonlyMap<string, FilterNode>;
  private readonly children: ReadonlyMap<string, readonly string[]>;
  private readonly descendants: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(
    nodes: Map<string, FilterNode>,
    children: Map<string, string[]>,
    descendants: Map<string, Set<string>>,
  ) {
    this.nodes = nodes;
    this.children = children;
    this.descendants = descendants;
  }

  /**
   * Build the hierarchy from topography rows and link each vocabulary row to
   * the Site of the first topography row whose codes match its topography code.
   * Rows with ID_SEPARATOR in a name are left out and counted.
   */
  static build(
    rows: readonly TopographyRow[],
    vocabulary: readonly VocabularyRow[],
  ): TopographyBuild {
    const nodes = new Map<string, FilterNode>();
    const children = new Map<string, string[]>([[ROOT_KEY, []]]);
    const siteRules: SiteRule[] = [];

    const ensureNode = (
      level: FilterLevel,
      name: string,
      parentId: string | null,
    ): string => {
      const id = parentId === null ? name : `${parentId}${ID_SEPARATOR}${name}`;
      if (!nodes.has(id)) {
        nodes.set(id, Object.freeze({ id, level, name, parentId }));
        children.get(parentId ?? ROOT_KEY)?.push(id);
        children.set(id, []);
      }
      return id;
    };

    let rejectedRows = 0;
    for (const row of rows) {
      // A separator inside a name would let a path id collide with a node
      // at another level
      if (
        [row.macroName, row.groupName, row.siteName].some((name) =>
          name.includes(ID_SEPARATOR),
        )
      ) {
        rejectedRows++;
        continue;
      }
      const macroId = ensureNode("macro", row.macroName, null);
      const groupId = ensureNode("group", row.groupName, macroId);
      const siteId = ensureNode("site", row.siteName, groupId);
      const rules = expandTopographyCode(row.codes);
      if (rules.length > 0) siteRules.push({ siteId, rules });
    }

    // Link terms to sites; a rule lookup per distinct topography code
    const siteByCode = new Map<string, string | null>();
    const resolveSite = (topographyCode: string): string | null => {
      if (!topographyCode) return null;
      const cached = siteByCode.get(topographyCode);
      if (cached !== undefined) return cached;
      const hit = siteRules.find((s) => matchesTopographyCode(topographyCode, s.rules));
      const siteId = hit ? hit.siteId : null;
      siteByCode.set(topographyCode, siteId);
      return siteId;
    };

    const descendants = new Map<string, Set<string>>();
    for (const id of nodes.keys()) descendants.set(id, new Set());

    const terms: Term[] = [];
    let unresolvedTerms = 0;
    for (const row of vocabulary) {
      const siteId = resolveSite(row.topographyCode);
      if (siteId === null) unresolvedTerms++;

      terms.push(
        Object.freeze({
          id: row.id,
          rawName: row.name,
          normalizedName: normalize(row.name),
          code: row.code,
          topographyCode: row.topographyCode,
          siteId,
        }),
      );

      // Register the term on its site and every ancestor
      let cursor: string | null = siteId;
      while (cursor !== null) {
        descendants.get(cursor)?.add(row.id);
        cursor = nodes.get(cursor)?.parentId ?? null;
      }
    }

    return {
      index: new TopographyIndex(nodes, children, descendants),
      terms,
      unresolvedTerms,
      rejectedRows,
    };
  }

  /** Macro nodes in first-encountered order. */
  roots(): FilterNode[] {
    return this.childrenOf(ROOT_KEY);
  }

  /** Direct children in first-encountered order. Unknown ids have none. */
  childrenOf(nodeId: string): FilterNode[] {
    const ids = this.children.get(nodeId) ?? [];
    const result: FilterNode[] = [];
    for (const id of ids) {
      const node = this.nodes.get(id);
      if (node) result.push(node);
    }
    return result;
  }

  getNode(nodeId: string): FilterNode | undefined {
    return this.nodes.get(nodeId);
  }

  /** Ids of every term whose Site is, or descends from, the node. */
  descendantTermIds(nodeId: string): ReadonlySet<string> {
    return this.descendants.get(nodeId) ?? EMPTY_IDS;
  }

  size(level: FilterLevel): number {
    let count = 0;
    for (const node of this.nodes.values()) {
      if (node.level === level) count++;
    }
    return count;
  }
}
