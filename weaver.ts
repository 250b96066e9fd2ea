import { createHash } from "node:crypto";
import type { MemoryConfig } from "./config.js";
import { MemoryGraphError, PersistenceError, describeError } from "./errors.js";
import { computeImportance } from "./importance.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { normalizeName } from "./text-utils.js";
import type {
  EntityRecord,
  ExtractedEntity,
  ExtractedRelation,
  GraphStore,
} from "./types.js";

export type WeaverConfig = Pick<MemoryConfig, "importance" | "edgeWeight">;

export type WeaveInput = {
  content: string;
  entities: ExtractedEntity[];
  relations: ExtractedRelation[];
  tags: string[];
  timestamp: number;
};

export type WeaveResult = {
  memoryId: string;
  entityIds: number[];
  relationshipIds: number[];
  importance: number;
  skippedRelations: number;
};

/** Deterministic memory id: 16 hex chars of SHA-256 over content and creation time. */
export function fingerprint(content: string, timestamp: number): string {
  return createHash("sha256").update(`${content}\u0000${timestamp}`).digest("hex").slice(0, 16);
}

export class GraphWeaver {
  constructor(
    private readonly store: GraphStore,
    private readonly config: WeaverConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Merge one memory's extraction into the graph and persist the memory.
   * All writes happen in a single store transaction; on failure nothing is kept
   * and a PersistenceError is thrown.
   */
  weave(input: WeaveInput): WeaveResult {
    const memoryId = fingerprint(input.content, input.timestamp);

    try {
      return this.store.transaction(() => this.weaveInTransaction(memoryId, input));
    } catch (err) {
      if (err instanceof MemoryGraphError) throw err;
      throw new PersistenceError(
        `failed to persist memory ${memoryId}: ${describeError(err)}`,
        err,
      );
    }
  }

  private weaveInTransaction(memoryId: string, input: WeaveInput): WeaveResult {
    const { timestamp } = input;

    // 1. resolve-or-create entity nodes
    const local = new Map<string, EntityRecord>();
    const touched = new Map<number, EntityRecord>();
    for (const extracted of input.entities) {
      const record = this.store.upsertEntity(extracted, timestamp);
      touched.set(record.id, record);
      if (!local.has(record.normalized_name)) {
        local.set(record.normalized_name, record);
      }
    }

    // 2. upsert edges, one per distinct triple in this memory
    const edgeIds = new Set<number>();
    const seenTriples = new Set<string>();
    let skippedRelations = 0;
    for (const relation of input.relations) {
      const source = this.resolveEndpoint(relation.subject, local);
      const target = this.resolveEndpoint(relation.object, local);
      if (!source || !target) {
        skippedRelations++;
        this.logger.debug?.(
          `memory-graph: skipped ${relation.subject} --[${relation.label}]--> ${relation.object}: ` +
            `unresolved ${source ? "object" : "subject"}`,
        );
        continue;
      }
      if (source.id === target.id) {
        skippedRelations++;
        this.logger.debug?.(`memory-graph: skipped self-loop ${relation.label} on ${source.name}`);
        continue;
      }

      const triple = `${source.id}:${relation.label}:${target.id}`;
      if (seenTriples.has(triple)) continue;
      seenTriples.add(triple);

      const edge = this.store.upsertEdge(
        source.id,
        relation.label,
        target.id,
        memoryId,
        this.config.edgeWeight,
        relation.context,
        timestamp,
      );
      edgeIds.add(edge.id);
    }

    // 3. importance
    const mentionTotal = [...touched.values()].reduce((sum, e) => sum + e.mention_count, 0);
    const importance = computeImportance(
      { mentionTotal, relationCount: edgeIds.size, recency: 1 },
      this.config.importance,
    );

    // 4. memory record
    const entityIds = [...touched.keys()];
    this.store.insertMemory({
      id: memoryId,
      content: input.content,
      tags: input.tags,
      entity_ids: entityIds,
      importance_score: importance,
      mention_total: mentionTotal,
      relation_count: edgeIds.size,
      created_at: timestamp,
      last_accessed: timestamp,
      access_count: 0,
    });

    return {
      memoryId,
      entityIds,
      relationshipIds: [...edgeIds],
      importance,
      skippedRelations,
    };
  }

  /** This memory's entities first, then anything already in the graph under that name. */
  private resolveEndpoint(text: string, local: Map<string, EntityRecord>): EntityRecord | undefined {
    const normalized = normalizeName(text);
    if (!normalized) return undefined;
    return local.get(normalized) ?? this.store.findEntitiesByName(normalized)[0];
  }
}
