import type { MemoryConfig } from "./config.js";
import type { TextAnalyzer } from "./extractor.js";
import { MemoryGraphError, PersistenceError, describeError } from "./errors.js";
import { computeImportance } from "./importance.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { contentTokens, jaccard, normalizeName } from "./text-utils.js";
import type {
  EntityExploration,
  EntityRecord,
  GraphStore,
  MemoryRecord,
  ScoredMemory,
} from "./types.js";

// Importance is unbounded in relation count; it contributes at most scoring.importance.
const IMPORTANCE_CAP = 1;

export type RetrieverConfig = Pick<MemoryConfig, "scoring" | "importance" | "relevanceThreshold">;

type Candidate = {
  memory: MemoryRecord;
  score: number;
  matchedIds: number[];
};

export class MemoryRetriever {
  constructor(
    private readonly store: GraphStore,
    private readonly analyzer: TextAnalyzer,
    private readonly config: RetrieverConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Rank stored memories against `text`:
   * lexical * jaccard + entityOverlap * shared/queryEntities + importance * min(importance_score, 1).
   * Memories under the relevance threshold are dropped. The returned memories
   * are marked as accessed at `now`.
   */
  query(text: string, topK: number, now: number): ScoredMemory[] {
    const memories = this.store.getAllMemories();
    if (memories.length === 0) return [];

    const resolved = this.resolveQueryEntities(text);
    const queryTokens = contentTokens(text);
    const { scoring } = this.config;

    const candidates: Candidate[] = [];
    for (const memory of memories) {
      const memoryEntities = new Set(memory.entity_ids);
      const matchedIds = resolved.filter(
        (id): id is number => id !== undefined && memoryEntities.has(id),
      );
      const overlap = resolved.length > 0 ? matchedIds.length / resolved.length : 0;
      const lexical = jaccard(queryTokens, contentTokens(memory.content));
      const score =
        scoring.lexical * lexical +
        scoring.entityOverlap * overlap +
        scoring.importance * Math.min(memory.importance_score, IMPORTANCE_CAP);

      if (score < this.config.relevanceThreshold) continue;
      candidates.push({ memory, score, matchedIds: [...new Set(matchedIds)] });
    }

    candidates.sort(
      (a, b) =>
        b.score - a.score ||
        b.memory.created_at - a.memory.created_at ||
        a.memory.id.localeCompare(b.memory.id),
    );
    const top = candidates.slice(0, topK);

    this.logger.debug?.(
      `memory-graph: query matched ${candidates.length}/${memories.length} memories, returning ${top.length}`,
    );
    if (top.length === 0) return [];

    try {
      this.store.transaction(() => {
        for (const { memory } of top) {
          const importance = computeImportance(
            { mentionTotal: memory.mention_total, relationCount: memory.relation_count, recency: 1 },
            this.config.importance,
          );
          this.store.updateMemoryAccess(memory.id, now, importance);
        }
      });
    } catch (err) {
      if (err instanceof MemoryGraphError) throw err;
      throw new PersistenceError(`failed to record memory access: ${describeError(err)}`, err);
    }

    const names = new Map(
      this.store.getEntities([...new Set(top.flatMap((c) => c.matchedIds))]).map((e) => [e.id, e.name]),
    );

    return top.map(({ memory, score, matchedIds }) => ({
      memoryId: memory.id,
      content: memory.content,
      score,
      matchedEntities: matchedIds.flatMap((id) => names.get(id) ?? []),
      tags: memory.tags,
      importance: memory.importance_score,
      createdAt: memory.created_at,
    }));
  }

  /**
   * One entry per distinct query entity: the stored id it resolves to, or
   * undefined when the graph has never seen it. Exact identity key first, then
   * the same name under any type, since a query rarely carries enough context
   * to type its entities the way the statement did.
   */
  private resolveQueryEntities(text: string): Array<number | undefined> {
    return this.analyzer.extractEntities(text).map(
      (entity) =>
        this.store.findEntity(entity.normalized, entity.type)?.id ??
        this.store.findEntitiesByName(entity.normalized)[0]?.id,
    );
  }

  /** Resolve `name` to an entity and list its one-hop neighbors, heaviest edge first. */
  exploreEntity(name: string): EntityExploration {
    const entity = this.resolveEntity(name);
    if (!entity) {
      this.logger.debug?.(`memory-graph: no entity found for "${name}"`);
      return { entity: null, connectedEntities: [] };
    }

    return {
      entity,
      connectedEntities: this.store.getNeighbors(entity.id).map((n) => ({
        entity: n.entity,
        relationLabel: n.edge.label,
        weight: n.edge.weight,
        direction: n.direction,
      })),
    };
  }

  private resolveEntity(name: string): EntityRecord | undefined {
    const normalized = normalizeName(name);
    return (
      this.store.findEntitiesByName(normalized)[0] ?? this.store.searchEntities(normalized, 1)[0]
    );
  }
}
