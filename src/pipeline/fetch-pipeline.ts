/**
 * Fetch Pipeline
 *
 * Fixed-size worker pool that downloads profile pages and turns them into records.
 *
 * - Each worker owns one keep-alive session for its whole life; sessions are never shared
 * - Each worker pauses for a random delay before every request
 * - HTTP and network failures are logged and skipped; nothing a single URL does stops the pool
 * - Records are collected in completion order
 */

import { HttpStatusError, describeError } from "../errors.js";
import { parseProfilePage, type ProfileParser } from "../extraction/profile-parser.js";
import { hasContactSignal } from "../extraction/record.js";
import { decodeBody, type HttpSession, type SessionFactory } from "../http/session.js";
import type { FetchFailure, HarvestProgress, ProfileRecord } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { NO_DELAY, paceRequest, type DelayRange } from "../utils/rate-limiter.js";

export interface FetchPipelineOptions {
  /** Number of workers. Default: 8 */
  concurrency?: number;
  /** Pause before each request. Default: no pause */
  delay?: DelayRange;
  /** Creates the session each worker owns */
  createSession: SessionFactory;
  /** Page request timeout. Default: the session's own */
  timeoutMs?: number;
  /** Page-to-record extraction. Default: parseProfilePage */
  parse?: ProfileParser;
  logger?: Logger;
  /** Log a progress line every N processed URLs. Default: 100 */
  progressInterval?: number;
  onProgress?: (progress: HarvestProgress) => void;
}

export interface PipelineResult {
  /** In completion order, one per URL that yielded a record */
  records: ProfileRecord[];
  failures: FetchFailure[];
}

type UrlOutcome = { record: ProfileRecord } | { failure: FetchFailure };

/**
 * Fetch and parse every URL with a bounded worker pool.
 *
 * @example
 * const { records, failures } = await fetchProfiles(urls, {
 *   concurrency: 4,
 *   delay: { minMs: 300, maxMs: 800 },
 *   createSession: createSessionFactory({ timeoutMs: 60_000 }),
 * });
 */
export async function fetchProfiles(
  urls: readonly string[],
  options: FetchPipelineOptions
): Promise<PipelineResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 8));
  const delay = options.delay ?? NO_DELAY;
  const parse = options.parse ?? parseProfilePage;
  const progressInterval = options.progressInterval ?? 100;
  const { logger } = options;

  const records: ProfileRecord[] = [];
  const failures: FetchFailure[] = [];
  let cursor = 0;
  let completed = 0;

  async function processUrl(session: HttpSession, url: string): Promise<UrlOutcome> {
    const waited = await paceRequest(delay);
    if (waited > 0) {
      logger?.debug(`Waiting ${(waited / 1000).toFixed(2)}s before requesting ${url}`);
    }

    const outcome = await session.get(url, { timeoutMs: options.timeoutMs });
    if (!outcome.ok) {
      if (outcome.error instanceof HttpStatusError) {
        logger?.warn(`HTTP error ${outcome.error.statusCode} on ${url}`);
        return {
          failure: { url, reason: outcome.error.message, statusCode: outcome.error.statusCode },
        };
      }
      logger?.warn(outcome.error.message);
      return { failure: { url, reason: outcome.error.message } };
    }

    const html = decodeBody(outcome.body, outcome.headers["content-type"]);
    const record = parse(html, url, logger);
    if (!hasContactSignal(record)) {
      logger?.debug(`Empty profile at ${url}`);
    }
    return { record };
  }

  function settle(url: string, outcome: UrlOutcome): void {
    if ("record" in outcome) records.push(outcome.record);
    else failures.push(outcome.failure);

    completed++;
    if (progressInterval > 0 && completed % progressInterval === 0) {
      logger?.info(`Profiles processed: ${completed}`);
    }
    try {
      options.onProgress?.({ completed, total: urls.length, currentUrl: url });
    } catch (error: unknown) {
      logger?.warn(`Progress callback failed on ${url}: ${describeError(error)}`);
    }
  }

  async function worker(): Promise<void> {
    const session = options.createSession();
    try {
      while (cursor < urls.length) {
        const url = urls[cursor++];
        let outcome: UrlOutcome;
        try {
          outcome = await processUrl(session, url);
        } catch (error: unknown) {
          logger?.warn(`Unhandled error on ${url}: ${describeError(error)}`);
          outcome = { failure: { url, reason: describeError(error) } };
        }
        settle(url, outcome);
      }
    } finally {
      session.close();
    }
  }

  const workerCount = Math.min(concurrency, urls.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return { records, failures };
}
