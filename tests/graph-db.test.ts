import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { GraphDB } from "../graph-db.js";
import { PersistenceError } from "../errors.js";
import type { ExtractedEntity, MemoryRecord } from "../types.js";

const WEIGHTING = { initial: 0.5, increment: 0.1 };

function createTestDb(): { db: GraphDB; dir: string } {
  const dir = join(tmpdir(), `memory-graph-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  const db = new GraphDB(join(dir, "nested", "memory.db"));
  db.initialize();
  return { db, dir };
}

function entity(surface: string, type: string, context = ""): ExtractedEntity {
  return {
    surface,
    normalized: surface.toLowerCase(),
    type,
    start: 0,
    end: surface.length,
    rule: "test",
    occurrences: 1,
    context,
  };
}

function memory(id: string, entityIds: number[], createdAt: number): MemoryRecord {
  return {
    id,
    content: `memory ${id}`,
    tags: ["work"],
    entity_ids: entityIds,
    importance_score: 0.5,
    mention_total: 0,
    relation_count: 0,
    created_at: createdAt,
    last_accessed: createdAt,
    access_count: 0,
  };
}

describe("GraphDB", () => {
  let db: GraphDB;
  let dir: string;

  beforeEach(() => {
    const t = createTestDb();
    db = t.db;
    dir = t.dir;
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("initialization", () => {
    it("should create the parent directory and an empty graph", () => {
      expect(db.stats()).toEqual({ entities: 0, relationships: 0, memories: 0 });
    });

    it("should be idempotent", () => {
      db.initialize();
      expect(db.stats()).toEqual({ entities: 0, relationships: 0, memories: 0 });
    });

    it("should refuse to work before initialize", () => {
      const fresh = new GraphDB(":memory:");
      expect(() => fresh.stats()).toThrow(PersistenceError);
    });
  });

  describe("upsertEntity", () => {
    it("should insert a new entity with one mention", () => {
      const john = db.upsertEntity(entity("John", "PERSON", "John works"), 100);
      expect(john).toMatchObject({
        name: "John",
        normalized_name: "john",
        type: "PERSON",
        mention_count: 1,
        first_seen: 100,
        last_seen: 100,
      });
      expect(db.stats().entities).toBe(1);
    });

    it("should merge on the normalized name and type", () => {
      const first = db.upsertEntity(entity("John", "PERSON", "short"), 100);
      const second = db.upsertEntity(entity("JOHN", "PERSON", "a longer context"), 200);
      expect(second.id).toBe(first.id);
      expect(second.mention_count).toBe(2);
      expect(second.context).toBe("a longer context");
      expect(second.last_seen).toBe(200);
      expect(second.first_seen).toBe(100);
      expect(db.findEntity("john", "PERSON")).toEqual(second);
    });

    it("should keep the same name under different types apart", () => {
      db.upsertEntity(entity("Apollo", "CONCEPT"), 100);
      db.upsertEntity(entity("Apollo", "CONCEPT"), 150);
      db.upsertEntity(entity("Apollo", "TECH"), 200);
      expect(db.stats().entities).toBe(2);
      expect(db.findEntitiesByName("apollo").map((e) => e.type)).toEqual(["CONCEPT", "TECH"]);
    });
  });

  describe("entity lookup", () => {
    it("should search by name through the full-text index", () => {
      db.upsertEntity(entity("Mountain View", "LOCATION"), 100);
      db.upsertEntity(entity("Google", "ORGANIZATION"), 100);
      expect(db.searchEntities("mountain").map((e) => e.name)).toEqual(["Mountain View"]);
    });

    it("should fall back to a substring match", () => {
      db.upsertEntity(entity("TensorFlow", "TECH"), 100);
      expect(db.searchEntities("sorflo").map((e) => e.name)).toEqual(["TensorFlow"]);
    });

    it("should match names only, not type tags", () => {
      db.upsertEntity(entity("John", "PERSON"), 100);
      expect(db.searchEntities("person")).toEqual([]);
    });

    it("should treat LIKE wildcards in the query literally", () => {
      db.upsertEntity(entity("snake_case", "CONCEPT"), 100);
      db.upsertEntity(entity("snakexcase", "CONCEPT"), 100);
      expect(db.searchEntities("%")).toEqual([]);
      expect(db.searchEntities("e_c").map((e) => e.name)).toEqual(["snake_case"]);
    });

    it("should return entities in the requested id order", () => {
      const a = db.upsertEntity(entity("Alpha", "CONCEPT"), 100);
      const b = db.upsertEntity(entity("Beta", "CONCEPT"), 100);
      expect(db.getEntities([b.id, a.id]).map((e) => e.name)).toEqual(["Beta", "Alpha"]);
      expect(db.getEntities([])).toEqual([]);
    });

    it("should list entities filtered by type", () => {
      db.upsertEntity(entity("John", "PERSON"), 100);
      db.upsertEntity(entity("Python", "TECH"), 100);
      expect(db.getAllEntities("person").map((e) => e.name)).toEqual(["John"]);
      expect(db.getAllEntities()).toHaveLength(2);
    });
  });

  describe("upsertEdge", () => {
    let johnId: number;
    let googleId: number;

    beforeEach(() => {
      johnId = db.upsertEntity(entity("John", "PERSON"), 100).id;
      googleId = db.upsertEntity(entity("Google", "ORGANIZATION"), 100).id;
    });

    it("should create an edge with the initial weight", () => {
      const edge = db.upsertEdge(johnId, "WORKS_AT", googleId, "m1", WEIGHTING, "John works at Google", 100);
      expect(edge).toMatchObject({
        source_id: johnId,
        label: "WORKS_AT",
        target_id: googleId,
        weight: 0.5,
        provenance: ["m1"],
      });
      expect(db.stats().relationships).toBe(1);
    });

    it("should reinforce an existing edge and record provenance", () => {
      db.upsertEdge(johnId, "WORKS_AT", googleId, "m1", WEIGHTING, "", 100);
      const edge = db.upsertEdge(johnId, "WORKS_AT", googleId, "m2", WEIGHTING, "", 200);
      expect(edge.weight).toBeCloseTo(0.6);
      expect(edge.provenance).toEqual(["m1", "m2"]);
      expect(edge.updated_at).toBe(200);
      expect(db.getEdge(johnId, "WORKS_AT", googleId)).toEqual(edge);
      expect(db.stats().relationships).toBe(1);
    });

    it("should saturate the weight at 1", () => {
      let weight = 0;
      for (let i = 0; i < 8; i++) {
        weight = db.upsertEdge(johnId, "WORKS_AT", googleId, `m${i}`, WEIGHTING, "", 100 + i).weight;
      }
      expect(weight).toBe(1);
    });

    it("should keep direction and label distinct", () => {
      db.upsertEdge(johnId, "WORKS_AT", googleId, "m1", WEIGHTING, "", 100);
      db.upsertEdge(googleId, "WORKS_AT", johnId, "m1", WEIGHTING, "", 100);
      db.upsertEdge(johnId, "RELATES_TO", googleId, "m1", WEIGHTING, "", 100);
      expect(db.stats().relationships).toBe(3);
    });
  });

  describe("getNeighbors", () => {
    it("should list both directions, heaviest first", () => {
      const john = db.upsertEntity(entity("John", "PERSON"), 100);
      const google = db.upsertEntity(entity("Google", "ORGANIZATION"), 100);
      const ai = db.upsertEntity(entity("AI", "TECH"), 100);
      db.upsertEdge(john.id, "WORKS_AT", google.id, "m1", WEIGHTING, "", 100);
      db.upsertEdge(john.id, "WORKS_AT", google.id, "m2", WEIGHTING, "", 200);
      db.upsertEdge(ai.id, "RELATES_TO", john.id, "m3", WEIGHTING, "", 300);

      const neighbors = db.getNeighbors(john.id);
      expect(neighbors.map((n) => [n.entity.name, n.edge.label, n.direction])).toEqual([
        ["Google", "WORKS_AT", "outgoing"],
        ["AI", "RELATES_TO", "incoming"],
      ]);
      expect(neighbors[0].entity).toEqual(google);
    });

    it("should return nothing for an isolated entity", () => {
      const lonely = db.upsertEntity(entity("Lonely", "CONCEPT"), 100);
      expect(db.getNeighbors(lonely.id)).toEqual([]);
    });
  });

  describe("memories", () => {
    it("should store and load a memory with its entities", () => {
      const a = db.upsertEntity(entity("Alpha", "CONCEPT"), 100);
      const b = db.upsertEntity(entity("Beta", "CONCEPT"), 100);
      const stored = memory("m1", [b.id, a.id], 100);
      db.insertMemory(stored);
      expect(db.getMemory("m1")).toEqual(stored);
      expect(db.getMemory("missing")).toBeUndefined();
    });

    it("should list memories oldest first", () => {
      db.insertMemory(memory("late", [], 300));
      db.insertMemory(memory("early", [], 100));
      expect(db.getAllMemories().map((m) => m.id)).toEqual(["early", "late"]);
    });

    it("should record access", () => {
      db.insertMemory(memory("m1", [], 100));
      db.updateMemoryAccess("m1", 500, 0.75);
      expect(db.getMemory("m1")).toMatchObject({ last_accessed: 500, access_count: 1, importance_score: 0.75 });
      db.updateMemoryImportance("m1", 0.25);
      expect(db.getMemory("m1")).toMatchObject({ access_count: 1, importance_score: 0.25 });
    });

    it("should reject a duplicate id", () => {
      db.insertMemory(memory("m1", [], 100));
      expect(() => db.insertMemory(memory("m1", [], 200))).toThrow();
    });
  });

  describe("transaction", () => {
    it("should roll back every write when the callback throws", () => {
      expect(() =>
        db.transaction(() => {
          db.upsertEntity(entity("John", "PERSON"), 100);
          db.insertMemory(memory("m1", [], 100));
          throw new Error("boom");
        }),
      ).toThrow("boom");
      expect(db.stats()).toEqual({ entities: 0, relationships: 0, memories: 0 });
    });

    it("should return the callback's value", () => {
      expect(db.transaction(() => db.upsertEntity(entity("John", "PERSON"), 100).name)).toBe("John");
    });
  });

  describe("export", () => {
    it("should dump the whole graph", () => {
      const john = db.upsertEntity(entity("John", "PERSON"), 100);
      const google = db.upsertEntity(entity("Google", "ORGANIZATION"), 100);
      db.upsertEdge(john.id, "WORKS_AT", google.id, "m1", WEIGHTING, "", 100);
      db.insertMemory(memory("m1", [john.id, google.id], 100));

      const dump = db.export();
      expect(dump.entities.map((e) => e.name)).toEqual(["John", "Google"]);
      expect(dump.relationships).toHaveLength(1);
      expect(dump.memories.map((m) => m.entity_ids)).toEqual([[john.id, google.id]]);
    });
  });
});
