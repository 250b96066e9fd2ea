import { memoryConfigSchema, type MemoryConfig } from "./config.js";
import { ConfigError, InvalidInputError, PersistenceError, describeError } from "./errors.js";
import { TextAnalyzer } from "./extractor.js";
import { GraphDB } from "./graph-db.js";
import { computeImportance, recencyFactor } from "./importance.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { MemoryRetriever } from "./retriever.js";
import type {
  EntityExploration,
  EntityRecord,
  EntityType,
  ExtractionResult,
  GraphExport,
  GraphStore,
  MemoryRecord,
  ScoredMemory,
  SystemStats,
} from "./types.js";
import { GraphWeaver } from "./weaver.js";

export type MemorySystemOptions = {
  store: GraphStore;
  config: MemoryConfig;
  logger?: Logger;
  /** Epoch milliseconds. Defaults to Date.now. */
  clock?: () => number;
};

type Components = {
  analyzer: TextAnalyzer;
  weaver: GraphWeaver;
  retriever: MemoryRetriever;
};

function requireText(value: unknown, what: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidInputError(`${what} must be a non-empty string`);
  }
  return value;
}

function requireTags(tags: unknown): string[] {
  if (!Array.isArray(tags)) {
    throw new InvalidInputError("tags must be an array of strings");
  }
  const cleaned: string[] = [];
  for (const tag of tags) {
    if (typeof tag !== "string" || tag.trim().length === 0) {
      throw new InvalidInputError("tags must be non-empty strings");
    }
    if (!cleaned.includes(tag.trim())) cleaned.push(tag.trim());
  }
  return cleaned;
}

function mergeSection(current: object, override: unknown): unknown {
  if (override && typeof override === "object" && !Array.isArray(override)) {
    return { ...current, ...override };
  }
  return override ?? current;
}

/**
 * Public facade: ingestion, retrieval, exploration and stats over one graph store.
 * Single writer; every call completes synchronously.
 */
export class MemorySystem {
  private config: MemoryConfig;
  private components: Components;
  private readonly store: GraphStore;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private lastTimestamp = 0;

  constructor(options: MemorySystemOptions) {
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? createConsoleLogger();
    this.clock = options.clock ?? Date.now;
    this.components = this.build(this.config);
  }

  /** Parse `config`, open the SQLite store at `config.dbPath` and wire the components. */
  static open(config: unknown = {}, options: { logger?: Logger; clock?: () => number } = {}): MemorySystem {
    const parsed = memoryConfigSchema.parse(config);
    const db = new GraphDB(parsed.dbPath);
    try {
      db.initialize();
    } catch (err) {
      db.close();
      throw new PersistenceError(`cannot open ${parsed.dbPath}: ${describeError(err)}`, err);
    }
    const system = new MemorySystem({ store: db, config: parsed, ...options });
    system.logger.info?.(`memory-graph: opened ${parsed.dbPath}`);
    return system;
  }

  private build(config: MemoryConfig): Components {
    const analyzer = new TextAnalyzer(config, this.logger);
    return {
      analyzer,
      weaver: new GraphWeaver(this.store, config, this.logger),
      retriever: new MemoryRetriever(this.store, analyzer, config, this.logger),
    };
  }

  get currentConfig(): Readonly<MemoryConfig> {
    return this.config;
  }

  /**
   * Replace tunable settings at runtime. Components are rebuilt from the new
   * value; the store stays open, so `dbPath` cannot change.
   */
  reconfigure(overrides: Record<string, unknown>): MemoryConfig {
    const next = memoryConfigSchema.parse({
      ...this.config,
      ...overrides,
      scoring: mergeSection(this.config.scoring, overrides.scoring),
      importance: mergeSection(this.config.importance, overrides.importance),
      edgeWeight: mergeSection(this.config.edgeWeight, overrides.edgeWeight),
    });
    if (next.dbPath !== this.config.dbPath) {
      throw new ConfigError("dbPath cannot be changed on an open memory system");
    }
    this.components = this.build(next);
    this.config = next;
    return next;
  }

  /** Strictly increasing, so identical content never gets the same fingerprint. */
  private nextTimestamp(): number {
    const now = Math.max(this.clock(), this.lastTimestamp + 1);
    this.lastTimestamp = now;
    return now;
  }

  addMemory(content: string, tags: string[] = []): string {
    const text = requireText(content, "memory content");
    const cleanTags = requireTags(tags);

    const { entities, relations } = this.components.analyzer.extract(text);
    const result = this.components.weaver.weave({
      content: text,
      entities,
      relations,
      tags: cleanTags,
      timestamp: this.nextTimestamp(),
    });

    this.logger.info?.(
      `memory-graph: stored memory ${result.memoryId} (${result.entityIds.length} entities, ` +
        `${result.relationshipIds.length} relationships)`,
    );
    return result.memoryId;
  }

  queryMemory(content: string, topK: number = this.config.defaultTopK): ScoredMemory[] {
    const text = requireText(content, "query");
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidInputError("topK must be a positive integer");
    }
    return this.components.retriever.query(text, topK, this.nextTimestamp());
  }

  exploreEntity(name: string): EntityExploration {
    return this.components.retriever.exploreEntity(requireText(name, "entity name"));
  }

  getSystemStats(): SystemStats {
    const stats = this.store.stats();
    return {
      entityCount: stats.entities,
      relationshipCount: stats.relationships,
      memoryCount: stats.memories,
      dbPath: this.config.dbPath,
    };
  }

  /** Extraction preview; nothing is written. */
  analyze(text: string): ExtractionResult {
    return this.components.analyzer.extract(requireText(text, "text"));
  }

  getMemory(id: string): MemoryRecord | undefined {
    return this.store.getMemory(id);
  }

  listEntities(type?: EntityType): EntityRecord[] {
    return this.store.getAllEntities(type);
  }

  /**
   * Decay the recency term of every memory by the time since it was last
   * accessed. Returns the number of memories re-scored.
   */
  rescoreMemories(): number {
    const now = this.nextTimestamp();
    const weights = this.config.importance;
    const memories = this.store.getAllMemories();

    this.store.transaction(() => {
      for (const memory of memories) {
        const importance = computeImportance(
          {
            mentionTotal: memory.mention_total,
            relationCount: memory.relation_count,
            recency: recencyFactor(memory.last_accessed, now, weights.recencyHalfLifeMs),
          },
          weights,
        );
        this.store.updateMemoryImportance(memory.id, importance);
      }
    });
    return memories.length;
  }

  exportGraph(): GraphExport {
    return this.store.export();
  }

  close(): void {
    this.store.close();
  }
}
