#!/usr/bin/env node

/**
 * treecrawl CLI - incremental Jira hierarchy crawler
 */

import { Command } from "commander";
import * as path from "path";
import { handleCrawl, handleRetryFailed } from "./cli/crawl-commands.js";
import { handleShow, handleStats, handleTree } from "./cli/tree-commands.js";
import type { CommandContext } from "./cli/context.js";
import { DEFAULT_DATA_DIR } from "./config.js";
import { VERSION } from "./version.js";

// Global state
let dataDir: string = DEFAULT_DATA_DIR;
let jsonOutput: boolean = false;

function getContext(): CommandContext {
  return { dataDir: path.resolve(dataDir), jsonOutput };
}

/**
 * Abort signal tied to Ctrl-C. A second Ctrl-C exits immediately.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error("\nInterrupted, finishing in-flight requests...");
    controller.abort();
  });
  return controller.signal;
}

// Create main program
const program = new Command();

program
  .name("treecrawl")
  .description("treecrawl - incremental Jira hierarchy crawler with a local cache")
  .version(VERSION)
  .option("--dir <path>", "Data directory", DEFAULT_DATA_DIR)
  .option("--json", "Output in JSON format")
  .hook("preAction", (thisCommand: Command) => {
    const opts = thisCommand.optsWithGlobals();
    if (typeof opts.dir === "string") dataDir = opts.dir;
    if (opts.json) jsonOutput = true;
  });

// ============================================================================
// CRAWL COMMANDS
// ============================================================================

program
  .command("crawl [keys...]")
  .description("Crawl the hierarchy below one or more root issues")
  .option("-m, --mode <mode>", "Crawl mode (full or delta)")
  .option("-f, --file <path>", "Read root keys from a file")
  .option("-c, --concurrency <n>", "Concurrent requests")
  .action(async (keys: string[], options) => {
    await handleCrawl(getContext(), keys, options, { signal: interruptSignal() });
  });

program
  .command("retry-failed")
  .description("Re-crawl the keys recorded in the failure log")
  .option("-c, --concurrency <n>", "Concurrent requests")
  .action(async (options) => {
    await handleRetryFailed(getContext(), options, { signal: interruptSignal() });
  });

// ============================================================================
// CACHE COMMANDS
// ============================================================================

program
  .command("tree <key>")
  .description("Show the cached hierarchy below a root issue")
  .option("--include-rejected", "Include rejected and withdrawn issues")
  .option("--preset <name>", "Hierarchy preset (management or full)")
  .action(async (key: string, options) => {
    await handleTree(getContext(), key, options);
  });

program
  .command("show <key>")
  .description("Show a cached issue")
  .action(async (key: string) => {
    await handleShow(getContext(), key);
  });

program
  .command("stats <key>")
  .description("Summarize the cached hierarchy below a root issue")
  .action(async (key: string) => {
    await handleStats(getContext(), key);
  });

await program.parseAsync(process.argv);
