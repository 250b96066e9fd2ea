import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { PersistenceError } from "./errors.js";
import { normalizeName } from "./text-utils.js";
import type {
  EdgeWeighting,
  EntityRecord,
  EntityType,
  ExtractedEntity,
  GraphExport,
  GraphStats,
  GraphStore,
  MemoryRecord,
  Neighbor,
  RelationshipRecord,
} from "./types.js";

type EdgeRow = Omit<RelationshipRecord, "provenance"> & { provenance: string };

type MemoryRow = Omit<MemoryRecord, "tags" | "entity_ids"> & { tags: string };

type NeighborRow = EdgeRow & {
  n_id: number;
  n_name: string;
  n_normalized_name: string;
  n_type: string;
  n_mention_count: number;
  n_context: string;
  n_first_seen: number;
  n_last_seen: number;
};

type CountRow = { count: number };

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&");
}

function toEdge(row: EdgeRow): RelationshipRecord {
  return { ...row, provenance: parseStringArray(row.provenance) };
}

function toMemory(row: MemoryRow, entityIds: number[]): MemoryRecord {
  return { ...row, tags: parseStringArray(row.tags), entity_ids: entityIds };
}

const NEIGHBOR_COLUMNS = `e.*, n.id as n_id, n.name as n_name, n.normalized_name as n_normalized_name,
  n.type as n_type, n.mention_count as n_mention_count, n.context as n_context,
  n.first_seen as n_first_seen, n.last_seen as n_last_seen`;

export class GraphDB implements GraphStore {
  private db: Database.Database | null = null;

  constructor(readonly dbPath: string) {}

  initialize(): void {
    if (this.db) return;

    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS entities (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        normalized_name TEXT NOT NULL,
        type TEXT NOT NULL,
        mention_count INTEGER NOT NULL DEFAULT 1,
        context TEXT NOT NULL DEFAULT '',
        first_seen INTEGER NOT NULL,
        last_seen INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_entities_identity ON entities(normalized_name, type);

      CREATE TABLE IF NOT EXISTS relationships (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_id INTEGER NOT NULL REFERENCES entities(id),
        label TEXT NOT NULL,
        target_id INTEGER NOT NULL REFERENCES entities(id),
        weight REAL NOT NULL,
        provenance TEXT NOT NULL DEFAULT '[]',
        context TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_relationships_source ON relationships(source_id);
      CREATE INDEX IF NOT EXISTS idx_relationships_target ON relationships(target_id);
      CREATE UNIQUE INDEX IF NOT EXISTS idx_relationships_triple ON relationships(source_id, label, target_id);

      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '[]',
        importance_score REAL NOT NULL DEFAULT 0,
        mention_total INTEGER NOT NULL DEFAULT 0,
        relation_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        last_accessed INTEGER NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at);

      CREATE TABLE IF NOT EXISTS memory_entities (
        memory_id TEXT NOT NULL REFERENCES memories(id),
        entity_id INTEGER NOT NULL REFERENCES entities(id),
        PRIMARY KEY (memory_id, entity_id)
      );

      CREATE INDEX IF NOT EXISTS idx_memory_entities_entity ON memory_entities(entity_id);
    `);

    // FTS5 index over entity names for fuzzy lookup
    const ftsExists = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name='entities_fts'",
      )
      .get();

    if (!ftsExists) {
      this.db.exec(`
        CREATE VIRTUAL TABLE entities_fts USING fts5(
          name,
          content=entities,
          content_rowid=id
        );

        CREATE TRIGGER IF NOT EXISTS entities_ai AFTER INSERT ON entities BEGIN
          INSERT INTO entities_fts(rowid, name) VALUES (new.id, new.name);
        END;

        CREATE TRIGGER IF NOT EXISTS entities_ad AFTER DELETE ON entities BEGIN
          INSERT INTO entities_fts(entities_fts, rowid, name) VALUES ('delete', old.id, old.name);
        END;

        CREATE TRIGGER IF NOT EXISTS entities_au AFTER UPDATE ON entities BEGIN
          INSERT INTO entities_fts(entities_fts, rowid, name) VALUES ('delete', old.id, old.name);
          INSERT INTO entities_fts(rowid, name) VALUES (new.id, new.name);
        END;
      `);

      this.db.exec(`
        INSERT INTO entities_fts(rowid, name)
        SELECT id, name FROM entities;
      `);
    }
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new PersistenceError("GraphDB not initialized. Call initialize() first.");
    }
    return this.db;
  }

  /** Run `fn` atomically. A throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T {
    return this.ensureDb().transaction(fn)();
  }

  upsertEntity(entity: ExtractedEntity, timestamp: number): EntityRecord {
    const db = this.ensureDb();
    const existing = this.findEntity(entity.normalized, entity.type);

    if (existing) {
      const context =
        entity.context.length > existing.context.length ? entity.context : existing.context;
      const lastSeen = Math.max(existing.last_seen, timestamp);

      db.prepare(
        "UPDATE entities SET mention_count = mention_count + 1, context = ?, last_seen = ? WHERE id = ?",
      ).run(context, lastSeen, existing.id);

      return {
        ...existing,
        mention_count: existing.mention_count + 1,
        context,
        last_seen: lastSeen,
      };
    }

    const result = db
      .prepare(
        `INSERT INTO entities (name, normalized_name, type, mention_count, context, first_seen, last_seen)
         VALUES (?, ?, ?, 1, ?, ?, ?)`,
      )
      .run(entity.surface, entity.normalized, entity.type, entity.context, timestamp, timestamp);

    return {
      id: Number(result.lastInsertRowid),
      name: entity.surface,
      normalized_name: entity.normalized,
      type: entity.type,
      mention_count: 1,
      context: entity.context,
      first_seen: timestamp,
      last_seen: timestamp,
    };
  }

  findEntity(normalizedName: string, type: EntityType): EntityRecord | undefined {
    return this.ensureDb()
      .prepare<[string, string], EntityRecord>(
        "SELECT * FROM entities WHERE normalized_name = ? AND type = ?",
      )
      .get(normalizeName(normalizedName), type);
  }

  /** Entities of any type with this normalized form, most mentioned first. */
  findEntitiesByName(normalizedName: string): EntityRecord[] {
    return this.ensureDb()
      .prepare<[string], EntityRecord>(
        `SELECT * FROM entities WHERE normalized_name = ?
         ORDER BY mention_count DESC, first_seen ASC, id ASC`,
      )
      .all(normalizeName(normalizedName));
  }

  searchEntities(query: string, limit: number = 10): EntityRecord[] {
    const db = this.ensureDb();

    // Build FTS5 query: quote each word and OR them. Words without a letter or
    // digit produce no FTS token, so they are left to the LIKE pass.
    const ftsQuery = query
      .split(/\s+/)
      .filter((w) => /[\p{L}\p{N}]/u.test(w))
      .map((w) => `"${w.replace(/"/g, '""')}"`)
      .join(" OR ");

    let rows: EntityRecord[] = [];

    if (ftsQuery) {
      rows = db
        .prepare<[string, number], EntityRecord>(
          `SELECT e.*
           FROM entities_fts fts
           JOIN entities e ON e.id = fts.rowid
           WHERE entities_fts MATCH ?
           ORDER BY rank, e.mention_count DESC
           LIMIT ?`,
        )
        .all(ftsQuery, limit);
    }

    // Fallback to LIKE search if FTS returned nothing
    if (rows.length === 0) {
      const likePattern = `%${escapeLike(normalizeName(query))}%`;
      rows = db
        .prepare<[string, number], EntityRecord>(
          `SELECT * FROM entities
           WHERE normalized_name LIKE ? ESCAPE '\\'
           ORDER BY mention_count DESC, last_seen DESC
           LIMIT ?`,
        )
        .all(likePattern, limit);
    }

    return rows;
  }

  getEntities(ids: number[]): EntityRecord[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => "?").join(", ");
    const rows = this.ensureDb()
      .prepare<number[], EntityRecord>(`SELECT * FROM entities WHERE id IN (${placeholders})`)
      .all(...ids);
    const order = new Map(ids.map((id, index) => [id, index]));
    return rows.sort((a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0));
  }

  getAllEntities(type?: EntityType): EntityRecord[] {
    const db = this.ensureDb();
    if (type) {
      return db
        .prepare<[string], EntityRecord>(
          "SELECT * FROM entities WHERE type = ? ORDER BY mention_count DESC, name ASC",
        )
        .all(type.toUpperCase());
    }
    return db
      .prepare<[], EntityRecord>("SELECT * FROM entities ORDER BY mention_count DESC, name ASC")
      .all();
  }

  getEdge(sourceId: number, label: string, targetId: number): RelationshipRecord | undefined {
    const row = this.ensureDb()
      .prepare<[number, string, number], EdgeRow>(
        "SELECT * FROM relationships WHERE source_id = ? AND label = ? AND target_id = ?",
      )
      .get(sourceId, label, targetId);
    return row ? toEdge(row) : undefined;
  }

  /**
   * Insert the (source, label, target) edge or reinforce the existing one.
   * Weight grows by `weighting.increment` per asserting memory and saturates at 1.
   */
  upsertEdge(
    sourceId: number,
    label: string,
    targetId: number,
    memoryId: string,
    weighting: EdgeWeighting,
    context: string,
    timestamp: number,
  ): RelationshipRecord {
    const db = this.ensureDb();
    const existing = this.getEdge(sourceId, label, targetId);

    if (existing) {
      const weight = Math.min(existing.weight + weighting.increment, 1);
      const provenance = existing.provenance.includes(memoryId)
        ? existing.provenance
        : [...existing.provenance, memoryId];
      const newContext = context.length > existing.context.length ? context : existing.context;

      db.prepare(
        "UPDATE relationships SET weight = ?, provenance = ?, context = ?, updated_at = ? WHERE id = ?",
      ).run(weight, JSON.stringify(provenance), newContext, timestamp, existing.id);

      return {
        ...existing,
        weight,
        provenance,
        context: newContext,
        updated_at: timestamp,
      };
    }

    const weight = Math.min(weighting.initial, 1);
    const provenance = [memoryId];
    const result = db
      .prepare(
        `INSERT INTO relationships (source_id, label, target_id, weight, provenance, context, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(sourceId, label, targetId, weight, JSON.stringify(provenance), context, timestamp, timestamp);

    return {
      id: Number(result.lastInsertRowid),
      source_id: sourceId,
      label,
      target_id: targetId,
      weight,
      provenance,
      context,
      created_at: timestamp,
      updated_at: timestamp,
    };
  }

  /** One-hop neighbors in both directions, heaviest edge first. */
  getNeighbors(entityId: number): Neighbor[] {
    const db = this.ensureDb();

    const outgoing = db
      .prepare<[number], NeighborRow>(
        `SELECT ${NEIGHBOR_COLUMNS}
         FROM relationships e
         JOIN entities n ON n.id = e.target_id
         WHERE e.source_id = ?`,
      )
      .all(entityId);

    const incoming = db
      .prepare<[number], NeighborRow>(
        `SELECT ${NEIGHBOR_COLUMNS}
         FROM relationships e
         JOIN entities n ON n.id = e.source_id
         WHERE e.target_id = ?`,
      )
      .all(entityId);

    const mapRow = (row: NeighborRow, direction: "outgoing" | "incoming"): Neighbor => ({
      entity: {
        id: row.n_id,
        name: row.n_name,
        normalized_name: row.n_normalized_name,
        type: row.n_type,
        mention_count: row.n_mention_count,
        context: row.n_context,
        first_seen: row.n_first_seen,
        last_seen: row.n_last_seen,
      },
      edge: toEdge({
        id: row.id,
        source_id: row.source_id,
        label: row.label,
        target_id: row.target_id,
        weight: row.weight,
        provenance: row.provenance,
        context: row.context,
        created_at: row.created_at,
        updated_at: row.updated_at,
      }),
      direction,
    });

    return [
      ...outgoing.map((r) => mapRow(r, "outgoing")),
      ...incoming.map((r) => mapRow(r, "incoming")),
    ].sort(
      (a, b) =>
        b.edge.weight - a.edge.weight ||
        a.edge.label.localeCompare(b.edge.label) ||
        a.entity.name.localeCompare(b.entity.name),
    );
  }

  insertMemory(memory: MemoryRecord): void {
    const db = this.ensureDb();
    db.prepare(
      `INSERT INTO memories (id, content, tags, importance_score, mention_total, relation_count,
                             created_at, last_accessed, access_count)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      memory.id,
      memory.content,
      JSON.stringify(memory.tags),
      memory.importance_score,
      memory.mention_total,
      memory.relation_count,
      memory.created_at,
      memory.last_accessed,
      memory.access_count,
    );

    const link = db.prepare("INSERT OR IGNORE INTO memory_entities (memory_id, entity_id) VALUES (?, ?)");
    for (const entityId of memory.entity_ids) {
      link.run(memory.id, entityId);
    }
  }

  getMemory(id: string): MemoryRecord | undefined {
    const db = this.ensureDb();
    const row = db.prepare<[string], MemoryRow>("SELECT * FROM memories WHERE id = ?").get(id);
    if (!row) return undefined;
    const entityIds = db
      .prepare<[string], { entity_id: number }>(
        "SELECT entity_id FROM memory_entities WHERE memory_id = ? ORDER BY rowid",
      )
      .all(id)
      .map((r) => r.entity_id);
    return toMemory(row, entityIds);
  }

  /** Every memory with its entity ids, oldest first. Used by the retriever's scan. */
  getAllMemories(): MemoryRecord[] {
    const db = this.ensureDb();
    const rows = db
      .prepare<[], MemoryRow>("SELECT * FROM memories ORDER BY created_at ASC, id ASC")
      .all();
    const links = db
      .prepare<[], { memory_id: string; entity_id: number }>(
        "SELECT memory_id, entity_id FROM memory_entities ORDER BY rowid",
      )
      .all();

    const byMemory = new Map<string, number[]>();
    for (const link of links) {
      const ids = byMemory.get(link.memory_id) ?? [];
      ids.push(link.entity_id);
      byMemory.set(link.memory_id, ids);
    }
    return rows.map((row) => toMemory(row, byMemory.get(row.id) ?? []));
  }

  updateMemoryAccess(id: string, accessedAt: number, importance: number): void {
    this.ensureDb()
      .prepare(
        `UPDATE memories
         SET access_count = access_count + 1, last_accessed = ?, importance_score = ?
         WHERE id = ?`,
      )
      .run(accessedAt, importance, id);
  }

  updateMemoryImportance(id: string, importance: number): void {
    this.ensureDb()
      .prepare("UPDATE memories SET importance_score = ? WHERE id = ?")
      .run(importance, id);
  }

  stats(): GraphStats {
    const db = this.ensureDb();
    const count = (table: string): number =>
      db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;
    return {
      entities: count("entities"),
      relationships: count("relationships"),
      memories: count("memories"),
    };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  export(): GraphExport {
    const db = this.ensureDb();
    const entities = db.prepare<[], EntityRecord>("SELECT * FROM entities ORDER BY id").all();
    const relationships = db
      .prepare<[], EdgeRow>("SELECT * FROM relationships ORDER BY id")
      .all()
      .map(toEdge);
    return { entities, relationships, memories: this.getAllMemories() };
  }
}
