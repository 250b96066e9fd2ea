export const BUILTIN_ENTITY_TYPES = [
  "PERSON",
  "ORGANIZATION",
  "TECH",
  "CONCEPT",
  "LOCATION",
] as const;

export type BuiltinEntityType = (typeof BUILTIN_ENTITY_TYPES)[number];

/** Built-in tag or a custom tag registered through `customEntityTypes`. */
export type EntityType = string;

export type EntityRecord = {
  id: number;
  name: string;
  normalized_name: string;
  type: EntityType;
  mention_count: number;
  context: string;
  first_seen: number;
  last_seen: number;
};

export type RelationshipRecord = {
  id: number;
  source_id: number;
  label: string;
  target_id: number;
  weight: number;
  provenance: string[];
  context: string;
  created_at: number;
  updated_at: number;
};

export type MemoryRecord = {
  id: string;
  content: string;
  tags: string[];
  entity_ids: number[];
  importance_score: number;
  mention_total: number;
  relation_count: number;
  created_at: number;
  last_accessed: number;
  access_count: number;
};

export type ExtractedEntity = {
  surface: string;
  normalized: string;
  type: EntityType;
  start: number;
  end: number;
  rule: string;
  occurrences: number;
  context: string;
};

export type ExtractedRelation = {
  subject: string;
  label: string;
  object: string;
  trigger: string;
  start: number;
  end: number;
  context: string;
};

export type ExtractionResult = {
  entities: ExtractedEntity[];
  relations: ExtractedRelation[];
};

export type Neighbor = {
  entity: EntityRecord;
  edge: RelationshipRecord;
  direction: "outgoing" | "incoming";
};

export type EdgeWeighting = {
  initial: number;
  increment: number;
};

export type GraphStats = {
  entities: number;
  relationships: number;
  memories: number;
};

export type GraphExport = {
  entities: EntityRecord[];
  relationships: RelationshipRecord[];
  memories: MemoryRecord[];
};

export type ScoredMemory = {
  memoryId: string;
  content: string;
  score: number;
  matchedEntities: string[];
  tags: string[];
  importance: number;
  createdAt: number;
};

export type ConnectedEntity = {
  entity: EntityRecord;
  relationLabel: string;
  weight: number;
  direction: "outgoing" | "incoming";
};

export type EntityExploration = {
  entity: EntityRecord | null;
  connectedEntities: ConnectedEntity[];
};

export type SystemStats = {
  entityCount: number;
  relationshipCount: number;
  memoryCount: number;
  dbPath: string;
};

/**
 * Persistence contract used by the weaver and retriever. Every write a single
 * `weave` performs runs inside one `transaction` call.
 */
export interface GraphStore {
  transaction<T>(fn: () => T): T;
  upsertEntity(entity: ExtractedEntity, timestamp: number): EntityRecord;
  findEntity(normalizedName: string, type: EntityType): EntityRecord | undefined;
  findEntitiesByName(normalizedName: string): EntityRecord[];
  searchEntities(query: string, limit?: number): EntityRecord[];
  getEntities(ids: number[]): EntityRecord[];
  getAllEntities(type?: EntityType): EntityRecord[];
  upsertEdge(
    sourceId: number,
    label: string,
    targetId: number,
    memoryId: string,
    weighting: EdgeWeighting,
    context: string,
    timestamp: number,
  ): RelationshipRecord;
  getNeighbors(entityId: number): Neighbor[];
  insertMemory(memory: MemoryRecord): void;
  getMemory(id: string): MemoryRecord | undefined;
  getAllMemories(): MemoryRecord[];
  updateMemoryAccess(id: string, accessedAt: number, importance: number): void;
  updateMemoryImportance(id: string, importance: number): void;
  stats(): GraphStats;
  export(): GraphExport;
  close(): void;
}
