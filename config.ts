import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { BUILTIN_ENTITY_TYPES } from "./types.js";

const TYPE_TAG = "^[A-Z][A-Z0-9_]*$";

const VocabularyRuleSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    type: Type.String({ pattern: TYPE_TAG }),
    kind: Type.Literal("vocabulary"),
    terms: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    caseSensitive: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

const PatternRuleSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    type: Type.String({ pattern: TYPE_TAG }),
    kind: Type.Literal("pattern"),
    pattern: Type.String({ minLength: 1 }),
    flags: Type.Optional(Type.String({ pattern: "^[imsu]*$" })),
  },
  { additionalProperties: false },
);

export const EntityRuleSpecSchema = Type.Union([VocabularyRuleSchema, PatternRuleSchema]);

export const RelationTemplateSpecSchema = Type.Object(
  {
    trigger: Type.String({ minLength: 1 }),
    label: Type.String({ pattern: TYPE_TAG }),
    inverse: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

const RuleSetSchema = Type.Object({
  entityRules: Type.Array(EntityRuleSpecSchema),
  relationTemplates: Type.Array(RelationTemplateSpecSchema),
});

const Weight = Type.Number({ minimum: 0 });

export const MemoryConfigSchema = Type.Object(
  {
    dbPath: Type.String({ minLength: 1 }),
    entityRules: Type.Array(EntityRuleSpecSchema, { minItems: 1 }),
    relationTemplates: Type.Array(RelationTemplateSpecSchema),
    customEntityTypes: Type.Array(Type.String({ pattern: TYPE_TAG })),
    relevanceThreshold: Weight,
    defaultTopK: Type.Integer({ minimum: 1, maximum: 1000 }),
    contextWindow: Type.Integer({ minimum: 0, maximum: 500 }),
    // importance_score is capped at 1 before weighting
    scoring: Type.Object(
      { lexical: Weight, entityOverlap: Weight, importance: Weight },
      { additionalProperties: false },
    ),
    importance: Type.Object(
      {
        mentionWeight: Weight,
        connectivityWeight: Weight,
        recencyWeight: Weight,
        recencyHalfLifeMs: Type.Number({ exclusiveMinimum: 0 }),
      },
      { additionalProperties: false },
    ),
    edgeWeight: Type.Object(
      {
        initial: Type.Number({ exclusiveMinimum: 0, maximum: 1 }),
        increment: Type.Number({ minimum: 0, maximum: 1 }),
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type MemoryConfig = Static<typeof MemoryConfigSchema>;
export type EntityRuleSpec = Static<typeof EntityRuleSpecSchema>;
export type RelationTemplateSpec = Static<typeof RelationTemplateSpecSchema>;
export type ScoringWeights = MemoryConfig["scoring"];
export type ImportanceWeights = MemoryConfig["importance"];

const DEFAULT_DB_PATH = join(homedir(), ".contextual-memory", "memory.db");
const DEFAULT_RELEVANCE_THRESHOLD = 0.15;
const DEFAULT_TOP_K = 5;
const DEFAULT_CONTEXT_WINDOW = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export function readDataFile<T extends TSchema>(fileName: string, schema: T): Static<T> {
  const url = new URL(`./data/${fileName}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  if (!Value.Check(schema, parsed)) {
    throw new ConfigError(`data/${fileName}: ${firstError(schema, parsed)}`);
  }
  return parsed;
}

let defaultRules: Static<typeof RuleSetSchema> | null = null;

export function loadDefaultRules(): Static<typeof RuleSetSchema> {
  defaultRules ??= readDataFile("default-rules.json", RuleSetSchema);
  return defaultRules;
}

export function defaultMemoryConfig(): MemoryConfig {
  const rules = loadDefaultRules();
  return {
    dbPath: DEFAULT_DB_PATH,
    entityRules: rules.entityRules,
    relationTemplates: rules.relationTemplates,
    customEntityTypes: [],
    relevanceThreshold: DEFAULT_RELEVANCE_THRESHOLD,
    defaultTopK: DEFAULT_TOP_K,
    contextWindow: DEFAULT_CONTEXT_WINDOW,
    scoring: { lexical: 0.5, entityOverlap: 0.4, importance: 0.05 },
    importance: {
      mentionWeight: 0.3,
      connectivityWeight: 0.2,
      recencyWeight: 0.5,
      recencyHalfLifeMs: 7 * DAY_MS,
    },
    edgeWeight: { initial: 0.5, increment: 0.1 },
  };
}

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new ConfigError(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function section(base: object, override: unknown): unknown {
  return isRecord(override) ? { ...base, ...override } : (override ?? base);
}

function firstError(schema: TSchema, value: unknown): string {
  const error = Value.Errors(schema, value).First();
  if (!error) return "invalid value";
  return `${error.path || "/"} ${error.message}`;
}

function validateRules(config: MemoryConfig): void {
  const knownTypes = new Set<string>([...BUILTIN_ENTITY_TYPES, ...config.customEntityTypes]);
  for (const rule of config.entityRules) {
    if (!knownTypes.has(rule.type)) {
      throw new ConfigError(
        `entity rule "${rule.name}" uses unregistered type ${rule.type}; add it to customEntityTypes`,
      );
    }
    if (rule.kind === "pattern") {
      try {
        new RegExp(rule.pattern, rule.flags);
      } catch (err) {
        throw new ConfigError(`entity rule "${rule.name}" has an invalid pattern: ${String(err)}`);
      }
    }
  }
}

export const memoryConfigSchema = {
  /**
   * Fill defaults into a partial config and validate it. Nested weight tables
   * merge key by key; rule lists replace the defaults wholesale.
   */
  parse(value: unknown = {}): MemoryConfig {
    if (!isRecord(value)) {
      throw new ConfigError("memory config must be an object");
    }
    const defaults = defaultMemoryConfig();
    const merged: Record<string, unknown> = {
      ...defaults,
      ...value,
      scoring: section(defaults.scoring, value.scoring),
      importance: section(defaults.importance, value.importance),
      edgeWeight: section(defaults.edgeWeight, value.edgeWeight),
    };
    if (typeof merged.dbPath === "string") {
      merged.dbPath = resolveEnvVars(merged.dbPath);
    }

    if (!Value.Check(MemoryConfigSchema, merged)) {
      throw new ConfigError(`invalid memory config: ${firstError(MemoryConfigSchema, merged)}`);
    }
    validateRules(merged);
    return merged;
  },
};
