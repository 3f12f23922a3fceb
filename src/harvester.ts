import { collectProfileUrls } from "./discovery/sitemap-walker.js";
import { ConfigurationError } from "./errors.js";
import { hasContactSignal } from "./extraction/record.js";
import { CsvRecordExporter, type RecordExporter } from "./export/csv-exporter.js";
import { createSessionFactory, type SessionFactory } from "./http/session.js";
import { fetchProfiles } from "./pipeline/fetch-pipeline.js";
import {
  DEFAULT_OPTIONS,
  type HarvestOptions,
  type HarvestProgress,
  type HarvestSummary,
} from "./types.js";
import { createLogger, type Logger } from "./utils/logger.js";

export interface HarvesterDeps {
  /** Default: keep-alive got-scraping sessions */
  createSession?: SessionFactory;
  /** Default: CSV */
  exporter?: RecordExporter;
  logger?: Logger;
  onProgress?: (progress: HarvestProgress) => void;
}

/**
 * Check run options before anything touches the network.
 *
 * @throws ConfigurationError listing every problem found
 */
export function validateHarvestOptions(options: HarvestOptions): void {
  const issues: string[] = [];

  if (options.sitemaps.length === 0) {
    issues.push("at least one seed sitemap is required");
  }
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    issues.push(`concurrency must be a positive integer (got ${options.concurrency})`);
  }
  if (options.delay.minMs < 0 || options.delay.maxMs < 0) {
    issues.push("delays must not be negative");
  }
  if (options.delay.minMs > options.delay.maxMs) {
    issues.push(
      `minimum delay (${options.delay.minMs}ms) cannot be greater than maximum delay (${options.delay.maxMs}ms)`
    );
  }
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    issues.push(`limit must be a non-negative integer (got ${options.limit})`);
  }
  if (!options.profileMarker.trim()) {
    issues.push("profile marker must not be empty");
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

/**
 * Run coordinator: sitemap walk, fetch pipeline, export.
 *
 * @example
 * const harvester = new Harvester({ sitemaps: ['https://example.com/sitemap.xml'] });
 * const summary = await harvester.run();
 * console.log(`${summary.records} records written to ${summary.outputPath}`);
 */
export class Harvester {
  private options: HarvestOptions;
  private logger: Logger;
  private createSession: SessionFactory;
  private exporter: RecordExporter;
  private onProgress?: (progress: HarvestProgress) => void;

  constructor(options: Partial<HarvestOptions> = {}, deps: HarvesterDeps = {}) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
    };
    this.logger = deps.logger ?? createLogger("harvester");
    this.createSession = deps.createSession ?? createSessionFactory();
    this.exporter = deps.exporter ?? new CsvRecordExporter();
    this.onProgress = deps.onProgress;
  }

  /**
   * Execute one run.
   *
   * A run that finds no profile URLs or parses no records logs an error and writes nothing.
   *
   * @throws ConfigurationError before any network activity when the options are inconsistent
   */
  async run(): Promise<HarvestSummary> {
    validateHarvestOptions(this.options);
    const startTime = Date.now();
    const { sitemaps, limit, output } = this.options;

    this.logger.info(`Seed sitemaps: ${sitemaps.join(", ")}`);

    const walkSession = this.createSession();
    let profileUrls: string[];
    let sitemapFailures: HarvestSummary["failures"];
    try {
      const walk = await collectProfileUrls(sitemaps, {
        session: walkSession,
        logger: this.logger,
        profileMarker: this.options.profileMarker,
        timeoutMs: this.options.sitemapTimeoutMs,
      });
      profileUrls = walk.profileUrls;
      sitemapFailures = walk.failures;
    } finally {
      walkSession.close();
    }

    if (limit !== undefined) {
      profileUrls = profileUrls.slice(0, limit);
      this.logger.info(`Processing only ${profileUrls.length} profiles because of the limit`);
    }

    if (profileUrls.length === 0) {
      this.logger.error("No profile URLs were found. Check the seed sitemaps.");
      return this.summarize("no-profiles", startTime, {
        profileUrls: 0,
        failures: sitemapFailures,
      });
    }

    this.logger.info(`Starting download of ${profileUrls.length} profiles`);

    const { records, failures } = await fetchProfiles(profileUrls, {
      concurrency: this.options.concurrency,
      delay: this.options.delay,
      createSession: this.createSession,
      timeoutMs: this.options.pageTimeoutMs,
      logger: this.logger,
      progressInterval: this.options.progressInterval,
      onProgress: this.onProgress,
    });

    const emptyRecords = records.filter((r) => !hasContactSignal(r)).length;
    const allFailures = [...sitemapFailures, ...failures];

    if (records.length === 0) {
      this.logger.error("No profile could be retrieved. Check the logs for details.");
      return this.summarize("no-records", startTime, {
        profileUrls: profileUrls.length,
        failures: allFailures,
      });
    }

    await this.exporter.export(records, output);
    this.logger.info(
      `Wrote ${records.length} records to ${output} (${emptyRecords} without contact data, ${failures.length} failed)`
    );

    return this.summarize("exported", startTime, {
      profileUrls: profileUrls.length,
      records: records.length,
      emptyRecords,
      failures: allFailures,
      outputPath: output,
    });
  }

  private summarize(
    status: HarvestSummary["status"],
    startTime: number,
    partial: Partial<Omit<HarvestSummary, "status" | "durationMs">>
  ): HarvestSummary {
    return {
      status,
      profileUrls: partial.profileUrls ?? 0,
      records: partial.records ?? 0,
      emptyRecords: partial.emptyRecords ?? 0,
      failures: partial.failures ?? [],
      outputPath: partial.outputPath,
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Convenience function to run a harvest
 */
export async function harvest(
  options: Partial<HarvestOptions> = {},
  deps: HarvesterDeps = {}
): Promise<HarvestSummary> {
  const harvester = new Harvester(options, deps);
  return harvester.run();
}
