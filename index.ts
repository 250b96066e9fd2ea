export { MemorySystem, type MemorySystemOptions } from "./memory-system.js";
export { TextAnalyzer, compileEntityRule, type EntityRule, type RuleMatch } from "./extractor.js";
export { GraphWeaver, fingerprint, type WeaveInput, type WeaveResult } from "./weaver.js";
export { MemoryRetriever } from "./retriever.js";
export { GraphDB } from "./graph-db.js";
export {
  memoryConfigSchema,
  defaultMemoryConfig,
  type MemoryConfig,
  type EntityRuleSpec,
  type RelationTemplateSpec,
} from "./config.js";
export { computeImportance, recencyFactor } from "./importance.js";
export {
  MemoryGraphError,
  InvalidInputError,
  PersistenceError,
  ConfigError,
  type MemoryGraphErrorCode,
} from "./errors.js";
export { createConsoleLogger, silentLogger, type Logger } from "./logger.js";
export * from "./types.js";
