/**
 * In-process vector store over a fixed passage set.
 *
 * Scores are cosine similarity between stem-count vectors, so it needs no
 * embedding provider. Used when no Supabase store is configured, with
 * passages loaded from a local JSON file.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { significantStems, stem, tokenize } from "../core/text.js";
import type { IVectorStore, VectorMatch } from "./types.js";

export const StrategyDocumentSchema = z.object({
  documentId: z.string().min(1),
  text: z.string().min(1),
});

export type StrategyDocument = z.infer<typeof StrategyDocumentSchema>;

const StrategyFileSchema = z.array(StrategyDocumentSchema);

function termCounts(text: string): Map<string, number> {
  const significant = new Set(significantStems(text));
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    const term = stem(token);
    if (significant.has(term)) {
      counts.set(term, (counts.get(term) ?? 0) + 1);
    }
  }
  return counts;
}

function cosine(a: Map<string, number>, b: Map<string, number>): number {
  let dot = 0;
  for (const [term, count] of a) {
    dot += count * (b.get(term) ?? 0);
  }
  if (dot === 0) return 0;

  const norm = (vector: Map<string, number>): number =>
    Math.sqrt([...vector.values()].reduce((sum, count) => sum + count * count, 0));
  return dot / (norm(a) * norm(b));
}

export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  private readonly indexed: Array<StrategyDocument & { vector: Map<string, number> }>;

  constructor(documents: readonly StrategyDocument[]) {
    this.indexed = documents.map((doc) => ({ ...doc, vector: termCounts(doc.text) }));
  }

  get size(): number {
    return this.indexed.length;
  }

  async similaritySearch(text: string, k: number): Promise<VectorMatch[]> {
    const query = termCounts(text);

    return this.indexed
      .map((doc) => ({ text: doc.text, documentId: doc.documentId, score: cosine(query, doc.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, k));
  }
}

/**
 * Read strategy passages from a JSON array of { documentId, text }
 */
export async function loadStrategyDocuments(path: string): Promise<StrategyDocument[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read strategy passages from ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      variable: "STRATEGY_PASSAGES_FILE",
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Strategy passages file ${path} is not valid JSON`, { variable: "STRATEGY_PASSAGES_FILE" });
  }

  const parsed = StrategyFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Strategy passages file ${path} has an unexpected shape: ${parsed.error.message}`, {
      variable: "STRATEGY_PASSAGES_FILE",
    });
  }
  return parsed.data;
}
