import type { Command } from "commander";
import { describeError } from "../errors.js";
import type { MemorySystem } from "../memory-system.js";

export function registerMemoryCli(
  program: Command,
  getSystem: () => MemorySystem | null,
): void {
  const memory = program.command("memory").description("Contextual memory graph commands");

  const withSystem =
    <A extends unknown[]>(action: (system: MemorySystem, ...args: A) => void) =>
    (...args: A): void => {
      const system = getSystem();
      if (!system) {
        console.error("Memory graph not initialized");
        process.exitCode = 1;
        return;
      }
      try {
        action(system, ...args);
      } catch (err) {
        console.error(`Error: ${describeError(err)}`);
        process.exitCode = 1;
      }
    };

  memory
    .command("add")
    .description("Store a memory")
    .argument("<text>", "Statement to remember")
    .option("-t, --tag <tag...>", "Context tags")
    .action(
      withSystem((system, text: string, opts: { tag?: string[] }) => {
        const id = system.addMemory(text, opts.tag ?? []);
        console.log(`Memory stored with ID: ${id}`);
      }),
    );

  memory
    .command("query")
    .description("Find memories relevant to a query")
    .argument("<text>", "Query text")
    .option("--limit <n>", "Max results")
    .action(
      withSystem((system, text: string, opts: { limit?: string }) => {
        const results = opts.limit
          ? system.queryMemory(text, parseInt(opts.limit, 10))
          : system.queryMemory(text);

        if (results.length === 0) {
          console.log("No relevant memories found.");
          return;
        }
        results.forEach((r, i) => {
          const matched = r.matchedEntities.length > 0 ? ` {${r.matchedEntities.join(", ")}}` : "";
          console.log(`${i + 1}. [${r.score.toFixed(3)}] ${r.memoryId} ${r.content}${matched}`);
        });
      }),
    );

  memory
    .command("explore")
    .description("Show an entity and its direct connections")
    .argument("<name>", "Entity name")
    .action(
      withSystem((system, name: string) => {
        const { entity, connectedEntities } = system.exploreEntity(name);
        if (!entity) {
          console.log(`Entity "${name}" not found.`);
          return;
        }

        console.log(`${entity.name} [${entity.type}] (mentions: ${entity.mention_count})`);
        if (connectedEntities.length === 0) {
          console.log("  No connections yet.");
          return;
        }
        for (const c of connectedEntities) {
          const arrow = c.direction === "outgoing" ? "->" : "<-";
          console.log(
            `  ${arrow} ${c.relationLabel} ${c.entity.name} [${c.entity.type}] (weight: ${c.weight.toFixed(2)})`,
          );
        }
      }),
    );

  memory
    .command("entities")
    .description("List entities")
    .option("--type <type>", "Filter by entity type (PERSON, TECH, ...)")
    .action(
      withSystem((system, opts: { type?: string }) => {
        const entities = system.listEntities(opts.type);
        if (entities.length === 0) {
          console.log("No entities found.");
          return;
        }
        for (const e of entities) {
          console.log(`  [${e.type}] ${e.name} x${e.mention_count}`);
        }
        console.log(`\nTotal: ${entities.length} entities`);
      }),
    );

  memory
    .command("stats")
    .description("Show memory graph statistics")
    .action(
      withSystem((system) => {
        const s = system.getSystemStats();
        console.log(`Entities: ${s.entityCount}`);
        console.log(`Relationships: ${s.relationshipCount}`);
        console.log(`Memories: ${s.memoryCount}`);
        console.log(`Database: ${s.dbPath}`);
      }),
    );

  memory
    .command("rescore")
    .description("Decay memory importance by time since last access")
    .action(
      withSystem((system) => {
        console.log(`Re-scored ${system.rescoreMemories()} memories`);
      }),
    );

  memory
    .command("export")
    .description("Export the full graph as JSON")
    .action(
      withSystem((system) => {
        console.log(JSON.stringify(system.exportGraph(), null, 2));
      }),
    );
}
