#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { describeError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";
import { MemorySystem } from "../memory-system.js";
import { registerMemoryCli } from "./memory-cli.js";

type GlobalOptions = { db?: string; config?: string; verbose?: boolean };

const program = new Command();
program
  .name("memory-graph")
  .description("Contextual memory graph")
  .option("--db <path>", "SQLite database file")
  .option("--config <file>", "JSON config file")
  .option("-v, --verbose", "Debug logging");

const state: { system: MemorySystem | null } = { system: null };

function openSystem(): MemorySystem | null {
  if (state.system) return state.system;
  const opts = program.opts<GlobalOptions>();
  try {
    const fileConfig: unknown = opts.config ? JSON.parse(readFileSync(opts.config, "utf8")) : {};
    const base = fileConfig && typeof fileConfig === "object" ? fileConfig : {};
    state.system = MemorySystem.open(opts.db ? { ...base, dbPath: opts.db } : base, {
      logger: createConsoleLogger({ debug: opts.verbose === true, info: opts.verbose === true }),
    });
  } catch (err) {
    console.error(`Cannot open memory graph: ${describeError(err)}`);
  }
  return state.system;
}

registerMemoryCli(program, openSystem);

try {
  program.parse();
} finally {
  state.system?.close();
}
