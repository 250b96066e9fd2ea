import type { ImportanceWeights } from "./config.js";

export type ImportanceInputs = {
  /** Sum of mention counts of the memory's entities at ingestion time. */
  mentionTotal: number;
  /** Distinct relationships the memory asserted. */
  relationCount: number;
  /** 1 when created or just accessed, decaying towards 0 with age. */
  recency: number;
};

/**
 * mentionWeight * ln(1 + mentions) + connectivityWeight * relations + recencyWeight * recency.
 * Non-decreasing in every input as long as the weights are non-negative.
 */
export function computeImportance(inputs: ImportanceInputs, weights: ImportanceWeights): number {
  return (
    weights.mentionWeight * Math.log1p(Math.max(0, inputs.mentionTotal)) +
    weights.connectivityWeight * Math.max(0, inputs.relationCount) +
    weights.recencyWeight * Math.min(1, Math.max(0, inputs.recency))
  );
}

/** Half-life decay of the time since last access. */
export function recencyFactor(lastAccessed: number, now: number, halfLifeMs: number): number {
  const age = Math.max(0, now - lastAccessed);
  return Math.pow(0.5, age / halfLifeMs);
}
