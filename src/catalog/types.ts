import { z } from "zod";

/**
 * JSON Schema for tool input parameters.
 * Follows the JSON Schema specification with type "object".
 */
export interface ToolInputSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** A tool as listed by an upstream server */
export interface ToolDescriptor {
  name: string;
  description?: string | undefined;
  inputSchema: ToolInputSchema;
}

/** Where a search hit came from */
export type SearchSource = "catalog" | "live";

/**
 * One ranked search result. Catalog and live search produce this same
 * shape so callers can treat them uniformly.
 */
export interface SearchHit {
  name: string;
  description: string | undefined;
  /** Server the tool belongs to */
  category_name: string;
  source: SearchSource;
  relevance_score: number;
  /** Query terms that contributed to the score */
  matched_terms: string[];
}

export const ToolInputSchemaSchema = z
  .object({
    type: z.literal("object"),
    properties: z.record(z.string(), z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

/** Schema for a tool entry in the catalog file */
export const ToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z
    .string()
    .nullish()
    .transform((d) => d ?? undefined),
  inputSchema: ToolInputSchemaSchema.default({ type: "object" }),
});
