/**
 * CLI entrypoint
 *
 * Usage:
 *   tsx src/cli.ts discover sites.txt [--workers 3] [--delay 1] [--timeout 15]
 *   tsx src/cli.ts retry
 *   tsx src/cli.ts queue
 *
 * Exit codes: 0 ok, 1 partial failures, 2 rate limited, 130 interrupted
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import type { PipelineConfig, PipelineConfigOverrides, Site } from "@/types";
import { EXIT_CODES } from "@/constants";
import { ConfigError, loadPipelineConfig } from "@/config";
import { closeDb, openDb, runMigrations } from "@/db";
import { readSiteList } from "@/input";
import { createRunContext, installInterruptHandler, runPipeline } from "@/orchestration";
import { RetryQueue } from "@/retry";
import * as logger from "@/logger";

/**
 * Open and migrate the database, run `fn`, close the database
 */
async function withDatabase<T>(config: PipelineConfig, fn: () => Promise<T>): Promise<T> {
  const db = openDb(config.dbPath);
  try {
    runMigrations(db);
    return await fn();
  } finally {
    closeDb();
  }
}

/**
 * Run the pipeline for `sites` with SIGINT handling; sets process.exitCode
 */
async function discoverSites(sites: Site[], config: PipelineConfig): Promise<void> {
  if (sites.length === 0) {
    logger.info("Nothing to do: no sites");
    process.exitCode = EXIT_CODES.OK;
    return;
  }

  const context = createRunContext();
  const removeHandler = installInterruptHandler(context, EXIT_CODES.INTERRUPTED);
  try {
    const { summary, exitCode } = await runPipeline(sites, { config, context });
    logger.info("Run complete", {
      succeeded: summary.succeeded,
      failed: summary.failed,
      retried: summary.retried,
      rateLimited: summary.rateLimited,
      skipped: summary.skipped,
      jobUrls: summary.jobUrls,
      exitCode,
    });
    process.exitCode = exitCode;
  } finally {
    removeHandler();
  }
}

type CliOptions = {
  workers?: number;
  delay?: number;
  timeout?: number;
  attempts?: number;
  cooldown?: number;
  pages?: number;
  empty?: "accept" | "reject";
  output?: string;
  db?: string;
};

function overridesFrom(argv: CliOptions): PipelineConfigOverrides {
  return {
    maxWorkers: argv.workers,
    requestDelaySeconds: argv.delay,
    requestTimeoutSeconds: argv.timeout,
    maxRetryAttempts: argv.attempts,
    rateLimitCooldownMinutes: argv.cooldown,
    maxPages: argv.pages,
    emptyResultPolicy: argv.empty,
    outputDir: argv.output,
    dbPath: argv.db,
  };
}

/**
 * Load configuration, reporting validation errors as exit code 1
 */
function loadConfigOrExit(overrides: PipelineConfigOverrides): PipelineConfig | null {
  try {
    return loadPipelineConfig(overrides);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message, { issues: err.issues });
      process.exitCode = EXIT_CODES.PARTIAL_FAILURE;
      return null;
    }
    throw err;
  }
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("ats-discovery")
    .usage("Usage: $0 <command> [options]")
    .options({
      workers: { type: "number", describe: "Parallel worker slots" },
      delay: { type: "number", describe: "Seconds between requests of one worker" },
      timeout: { type: "number", describe: "Per-request timeout in seconds" },
      attempts: { type: "number", describe: "Retryable failures allowed per site" },
      cooldown: { type: "number", describe: "Rate-limit cooldown in minutes" },
      pages: { type: "number", describe: "Maximum listing pages per site" },
      empty: {
        choices: ["accept", "reject"] as const,
        describe: "Outcome when no strategy finds job URLs",
      },
      output: { type: "string", describe: "Output directory" },
      db: { type: "string", describe: "SQLite database path" },
    })
    .command(
      "discover <input>",
      "Discover job URLs for every site in a file (Company|URL lines or JSON Lines)",
      (y) => y.positional("input", { type: "string", demandOption: true }),
      async (argv) => {
        const config = loadConfigOrExit(overridesFrom(argv));
        if (!config) {
          return;
        }
        const { sites } = readSiteList(argv.input);
        await withDatabase(config, () => discoverSites(sites, config));
      },
    )
    .command(
      "retry",
      "Run discovery again for every retry record that is due",
      (y) => y,
      async (argv) => {
        const config = loadConfigOrExit(overridesFrom(argv));
        if (!config) {
          return;
        }
        await withDatabase(config, async () => {
          const due = new RetryQueue().due(new Date());
          logger.info("Due retry records", { count: due.length });
          await discoverSites(
            due.map((record) => record.site),
            config,
          );
        });
      },
    )
    .command(
      "queue",
      "Print the retry queue",
      (y) => y,
      async (argv) => {
        const config = loadConfigOrExit({ dbPath: argv.db });
        if (!config) {
          return;
        }
        await withDatabase(config, async () => {
          const records = new RetryQueue().list();
          if (records.length === 0) {
            console.log("Retry queue is empty.");
            return;
          }
          for (const record of records) {
            console.log(
              [
                record.nextEligibleAt,
                record.kind.padEnd(16),
                `attempt ${record.attempt}`,
                `failures ${record.failureCount}`,
                `${record.site.company}|${record.site.careerUrl}`,
              ].join("  "),
            );
          }
        });
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .alias("h", "help")
    .parseAsync();
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exitCode = EXIT_CODES.PARTIAL_FAILURE;
});
