#!/usr/bin/env node
import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig, rawConfigFromEnv, type HarvestConfig } from "../config.js";
import { ConfigurationError, describeError } from "../errors.js";
import { Harvester } from "../harvester.js";
import { createLogger } from "../utils/logger.js";

async function main(): Promise<number> {
  const argv = yargs(hideBin(process.argv))
    .scriptName("profile-harvester")
    .usage(
      "$0 [options]\n\nDownloads every public advisor profile listed in the sitemaps and writes " +
        "a CSV with name, phones, address and email."
    )
    .options({
      sitemap: {
        type: "string",
        array: true,
        describe: "Seed sitemap URL. Repeat the option for several sources.",
      },
      output: { type: "string", describe: "Path of the CSV file to write" },
      limit: { type: "number", describe: "Maximum number of profiles to process" },
      "max-workers": { type: "number", describe: "Number of concurrent download workers" },
      "min-delay": { type: "number", describe: "Minimum delay (seconds) before each request" },
      "max-delay": { type: "number", describe: "Maximum delay (seconds) before each request" },
      "log-level": {
        type: "string",
        choices: ["debug", "info", "warn", "error"],
        describe: "Log verbosity",
      },
      "profile-marker": { type: "string", describe: "URL fragment identifying profile pages" },
      timeout: { type: "number", describe: "Profile page request timeout in seconds" },
    })
    .strict()
    .help()
    .parseSync();

  let config: HarvestConfig;
  try {
    config = loadConfig(
      {
        sitemaps: argv.sitemap,
        output: argv.output,
        limit: argv.limit,
        maxWorkers: argv["max-workers"],
        minDelay: argv["min-delay"],
        maxDelay: argv["max-delay"],
        logLevel: argv["log-level"],
        profileMarker: argv["profile-marker"],
        timeout: argv.timeout,
      },
      rawConfigFromEnv(process.env)
    );
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const logger = createLogger("harvester", config.logLevel);
  const summary = await new Harvester(config.options, { logger }).run();

  process.stdout.write(
    `${summary.status}: ${summary.records} records from ${summary.profileUrls} profile URLs ` +
      `(${summary.failures.length} failures) in ${(summary.durationMs / 1000).toFixed(1)}s\n`
  );
  return summary.status === "exported" ? 0 : 1;
}

process.once("SIGINT", () => {
  process.stderr.write("Interrupted\n");
  process.exit(130);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Fatal: ${describeError(error)}\n`);
    process.exitCode = 1;
  });
