import { Type } from "@sinclair/typebox";
import { readDataFile } from "./config.js";

let stopWords: ReadonlySet<string> | null = null;

/** Function words ignored by lexical similarity. Loaded once from data/stop-words.json. */
export function getStopWords(): ReadonlySet<string> {
  stopWords ??= new Set(readDataFile("stop-words.json", Type.Array(Type.String())));
  return stopWords;
}

export function normalizeName(name: string): string {
  return name.toLowerCase().trim().replace(/\s+/g, " ");
}

/**
 * Lower-case alphanumeric words with stop words removed, deduplicated.
 * "Google's AI" -> {"google", "ai"}.
 */
export function contentTokens(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length > 0);
  const stop = getStopWords();
  return new Set(words.filter((w) => !stop.has(w)));
}

/** Jaccard overlap of two token sets, in [0, 1]. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function lexicalSimilarity(query: string, content: string): number {
  return jaccard(contentTokens(query), contentTokens(content));
}

export function snippet(text: string, start: number, end: number, radius: number): string {
  return text.slice(Math.max(0, start - radius), Math.min(text.length, end + radius)).trim();
}
