/**
 * Relevance search over tool descriptors.
 *
 * Scoring is token overlap with a case-insensitive substring fallback:
 *
 * | match                                         | weight |
 * |-----------------------------------------------|--------|
 * | query token equals a name token               | 3      |
 * | query token contains / is contained in one    | 2      |
 * | query token equals a description token        | 1      |
 * | query token is a substring of the description | 0.5    |
 *
 * Containment only counts for tokens of three or more characters, so short
 * words like "a" or "in" match exact tokens only.
 * | whole query is a substring of the name        | +4     |
 * | whole query is a substring of the description | +1     |
 *
 * Tools scoring zero are dropped. Ties keep the order the tools were given
 * in (servers in insertion order, tools in listing order).
 *
 * @module catalog/search
 */

import type { SearchHit, SearchSource, ToolDescriptor } from "./types.js";

/** Tokens shorter than this never match by containment, on either side */
const MIN_CONTAINMENT_LENGTH = 3;

/**
 * Splits text into lower-case alphanumeric tokens, breaking camelCase,
 * snake_case and kebab-case words apart.
 */
export function tokenize(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

interface Scored {
  score: number;
  matched: string[];
}

function scoreTool(
  queryTokens: string[],
  queryText: string,
  tool: ToolDescriptor,
): Scored {
  const nameLower = tool.name.toLowerCase();
  const descLower = (tool.description ?? "").toLowerCase();
  const nameTokens = tokenize(tool.name);
  const descTokens = new Set(tokenize(tool.description ?? ""));

  let score = 0;
  const matched: string[] = [];

  for (const token of queryTokens) {
    let tokenScore = 0;

    const containable = token.length >= MIN_CONTAINMENT_LENGTH;

    if (nameTokens.includes(token)) {
      tokenScore += 3;
    } else if (
      nameTokens.some(
        (nameToken) =>
          (containable && nameToken.includes(token)) ||
          (nameToken.length >= MIN_CONTAINMENT_LENGTH &&
            token.includes(nameToken)),
      )
    ) {
      tokenScore += 2;
    }

    if (descTokens.has(token)) {
      tokenScore += 1;
    } else if (containable && descLower.includes(token)) {
      tokenScore += 0.5;
    }

    if (tokenScore > 0) {
      matched.push(token);
      score += tokenScore;
    }
  }

  if (queryText.length > 0) {
    if (nameLower.includes(queryText)) score += 4;
    if (descLower.includes(queryText)) score += 1;
  }

  return { score, matched };
}

/**
 * Ranks tools from one or more servers against a free-text query.
 *
 * @example
 * ```ts
 * const searcher = new ToolSearcher({ nlp: tools }, "catalog");
 * searcher.search("translate", 5);
 * // [{ name: "translate_text", category_name: "nlp", source: "catalog", relevance_score: 7, ... }]
 * ```
 */
export class ToolSearcher {
  private readonly toolsByServer: ReadonlyMap<string, readonly ToolDescriptor[]>;

  constructor(
    toolsByServer:
      | ReadonlyMap<string, readonly ToolDescriptor[]>
      | Readonly<Record<string, readonly ToolDescriptor[]>>,
    private readonly source: SearchSource,
  ) {
    this.toolsByServer =
      toolsByServer instanceof Map
        ? toolsByServer
        : new Map(Object.entries(toolsByServer));
  }

  /**
   * @param maxResults - Cap on returned hits; values below 1 return nothing
   */
  search(query: string, maxResults: number): SearchHit[] {
    const queryText = query.trim().toLowerCase();
    const queryTokens = Array.from(new Set(tokenize(query)));
    if (queryTokens.length === 0 || maxResults < 1) {
      return [];
    }

    const hits: SearchHit[] = [];
    for (const [server, tools] of this.toolsByServer) {
      for (const tool of tools) {
        const { score, matched } = scoreTool(queryTokens, queryText, tool);
        if (score <= 0) continue;
        hits.push({
          name: tool.name,
          description: tool.description,
          category_name: server,
          source: this.source,
          relevance_score: score,
          matched_terms: matched,
        });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep listing order.
    hits.sort((a, b) => b.relevance_score - a.relevance_score);
    return hits.slice(0, maxResults);
  }
}
