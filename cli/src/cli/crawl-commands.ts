/**
 * Crawl command handlers
 */

import * as fs from "fs";
import chalk from "chalk";
import Table from "cli-table3";
import type { CrawlMode } from "@treecrawl/types";
import type { CrawlReport } from "../crawler/engine.js";
import { ValidationError } from "../errors.js";
import type { TimingCollector } from "../timings.js";
import {
  createCrawlRuntime,
  fail,
  type CommandContext,
  type CommandDeps,
} from "./context.js";

const ISSUE_KEY_PATTERN = /[A-Z][A-Z0-9]*-\d+/g;

export interface CrawlOptions {
  mode?: string;
  file?: string;
  concurrency?: string;
}

export interface RetryFailedOptions {
  concurrency?: string;
}

function parseMode(value: string | undefined): CrawlMode | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value !== "full" && value !== "delta") {
    throw new ValidationError(`--mode must be "full" or "delta", got "${value}"`);
  }
  return value;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`--concurrency must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Issue keys from the command line and an optional key file, deduplicated
 */
export function collectKeys(keys: string[], file?: string): string[] {
  const collected = [...keys];
  if (file) {
    const content = fs.readFileSync(file, "utf8");
    collected.push(...(content.match(ISSUE_KEY_PATTERN) ?? []));
  }
  return [...new Set(collected)];
}

function printReports(reports: CrawlReport[], timings: TimingCollector): void {
  const table = new Table({
    head: [
      chalk.cyan("Root"),
      chalk.cyan("Mode"),
      chalk.cyan("Fetched"),
      chalk.cyan("Cached"),
      chalk.cyan("Retried"),
      chalk.cyan("Failed"),
      chalk.cyan("Time"),
    ],
  });
  for (const report of reports) {
    table.push([
      report.rootKey,
      report.mode,
      String(report.fetched.length),
      String(report.fromCache.length),
      String(report.retried.length),
      report.failed.length > 0 ? chalk.red(String(report.failed.length)) : "0",
      `${(report.durationMs / 1000).toFixed(1)}s`,
    ]);
  }
  console.log(table.toString());

  const summary = timings.summarize();
  if (summary.length > 0) {
    const apiTable = new Table({
      head: [
        chalk.cyan("Operation"),
        chalk.cyan("Calls"),
        chalk.cyan("Errors"),
        chalk.cyan("Avg ms"),
        chalk.cyan("Max ms"),
        chalk.cyan("Total ms"),
      ],
    });
    for (const entry of summary) {
      apiTable.push([
        entry.operation,
        String(entry.calls),
        String(entry.errors),
        String(entry.avgMs),
        String(entry.maxMs),
        String(entry.totalMs),
      ]);
    }
    console.log(chalk.bold("\nAPI performance:"));
    console.log(apiTable.toString());
  }
}

/**
 * Handle: treecrawl crawl <keys...> [--mode] [--file] [--concurrency]
 */
export async function handleCrawl(
  ctx: CommandContext,
  keys: string[],
  options: CrawlOptions,
  deps: CommandDeps = {}
): Promise<CrawlReport[]> {
  let reports: CrawlReport[] = [];
  try {
    const mode = parseMode(options.mode);
    const concurrency = parseConcurrency(options.concurrency);
    const rootKeys = collectKeys(keys, options.file);
    if (rootKeys.length === 0) {
      throw new ValidationError("No issue keys given");
    }

    const runtime = createCrawlRuntime(ctx, deps, { concurrency });
    const runMode = mode ?? runtime.config.crawl.mode;

    for (const [index, key] of rootKeys.entries()) {
      if (deps.signal?.aborted) {
        break;
      }
      if (!ctx.jsonOutput) {
        console.log(chalk.blue(`[${index + 1}/${rootKeys.length}] Crawling ${key} (${runMode})`));
      }
      reports.push(await runtime.engine.run(key, runMode, { signal: deps.signal }));
    }

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(reports, null, 2));
    } else {
      printReports(reports, runtime.timings);
      const failed = reports.reduce((sum, report) => sum + report.failed.length, 0);
      if (failed > 0) {
        console.log(
          chalk.yellow(`\n${failed} keys failed; see ${runtime.failureLog.filePath}`)
        );
      } else {
        console.log(chalk.green("\n✓ Crawl complete"));
      }
    }
  } catch (error) {
    fail(ctx, error);
  }

  if (reports.some((report) => report.failed.length > 0 || report.aborted)) {
    process.exitCode = 1;
  }
  return reports;
}

/**
 * Handle: treecrawl retry-failed
 *
 * Re-crawls every key in the failure log in full mode, then rewrites the
 * log with the keys that are still failing.
 */
export async function handleRetryFailed(
  ctx: CommandContext,
  options: RetryFailedOptions,
  deps: CommandDeps = {}
): Promise<string[]> {
  let stillFailing: string[] = [];
  try {
    const concurrency = parseConcurrency(options.concurrency);
    const runtime = createCrawlRuntime(ctx, deps, { concurrency, withFailureLog: false });
    const keys = runtime.failureLog.read();

    if (keys.length === 0) {
      if (ctx.jsonOutput) {
        console.log(JSON.stringify({ retried: [], stillFailing: [] }));
      } else {
        console.log(chalk.gray("No failed issues to retry"));
      }
      return [];
    }

    const reports: CrawlReport[] = [];
    for (const key of keys) {
      if (deps.signal?.aborted) {
        break;
      }
      reports.push(await runtime.engine.run(key, "full", { signal: deps.signal }));
    }

    // An aborted run only settles the root if it was loaded
    const attempted = new Set(
      reports
        .filter(
          (report) =>
            !report.aborted ||
            report.fetched.includes(report.rootKey) ||
            report.fromCache.includes(report.rootKey)
        )
        .map((report) => report.rootKey)
    );
    const failed = new Set(reports.flatMap((report) => report.failed));
    // Keys not attempted because of cancellation stay in the log
    stillFailing = [...failed, ...keys.filter((key) => !attempted.has(key))];
    stillFailing = [...new Set(stillFailing)];
    runtime.failureLog.rewrite(stillFailing);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ retried: keys, stillFailing }, null, 2));
    } else {
      printReports(reports, runtime.timings);
      const recovered = keys.filter((key) => !stillFailing.includes(key));
      console.log(chalk.green(`\n✓ Recovered ${recovered.length} of ${keys.length} keys`));
      if (stillFailing.length > 0) {
        console.log(chalk.yellow(`${stillFailing.length} keys still failing`));
      }
    }
  } catch (error) {
    fail(ctx, error);
  }

  if (stillFailing.length > 0) {
    process.exitCode = 1;
  }
  return stillFailing;
}
