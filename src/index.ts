#!/usr/bin/env node
import { USAGE, parseArgs } from "./config";
import { Crawler } from "./core/crawler";
import { ConfigError } from "./core/errors";
import { formatDuration, getErrorMessage } from "./core/utils";
import { CrawlConfig } from "./types";

/** Exit code for a run stopped by SIGINT/SIGTERM */
const EXIT_INTERRUPTED = 130;

async function main(): Promise<number> {
  let config: CrawlConfig;
  try {
    config = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Error: ${err.message}\n`);
    console.error(USAGE);
    return 1;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    console.log(`\nReceived ${signal}. Shutting down gracefully...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const crawler = await Crawler.create({
      destinationDir: config.destinationDir,
      maxConcurrency: config.concurrency,
      timeout: config.timeout,
    });

    console.log(`Starting crawl of ${config.startUrl}`);
    console.log(`   Destination directory: ${config.destinationDir}`);
    console.log(`   Max depth: ${config.depth}`);
    console.log(`   Concurrency: ${config.concurrency}`);
    console.log("   Press Ctrl-C to stop\n");

    const summary = await crawler.run(config.startUrl, config.depth, controller.signal);

    console.log("\n" + "=".repeat(60));
    console.log(`Crawl complete! Visited ${summary.visited.length} page(s)`);
    console.log(`   Downloaded: ${summary.downloaded}`);
    console.log(`   From cache: ${summary.cached}`);
    console.log(`   Failed:     ${summary.failed}`);
    console.log(`   Elapsed:    ${formatDuration(summary.elapsedMs)}`);
    console.log(`   Pages saved to: ${config.destinationDir}`);
    console.log("=".repeat(60));

    if (summary.cancelled) {
      console.log("Crawl was interrupted. Resume by running the same command again.");
      return EXIT_INTERRUPTED;
    }
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  });
