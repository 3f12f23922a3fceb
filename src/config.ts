import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_OPTIONS, type HarvestOptions } from "./types.js";
import type { LogLevel } from "./utils/logger.js";

/**
 * Raw values as they arrive from CLI flags or environment variables.
 * Delays are in seconds here; HarvestOptions keeps milliseconds.
 */
export interface RawConfig {
  sitemaps?: string | string[];
  output?: string;
  limit?: string | number;
  maxWorkers?: string | number;
  minDelay?: string | number;
  maxDelay?: string | number;
  logLevel?: string;
  profileMarker?: string;
  timeout?: string | number;
}

const sitemapList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  )
  .pipe(z.array(z.string().url()).min(1, "at least one seed sitemap is required"));

const seconds = z.coerce.number().nonnegative("must be a positive value");

const schema = z
  .object({
    sitemaps: sitemapList.default(DEFAULT_OPTIONS.sitemaps),
    output: z.string().min(1).default(DEFAULT_OPTIONS.output),
    limit: z.coerce.number().int().nonnegative().optional(),
    maxWorkers: z.coerce.number().int().positive().default(DEFAULT_OPTIONS.concurrency),
    minDelay: seconds.default(DEFAULT_OPTIONS.delay.minMs / 1000),
    maxDelay: seconds.default(DEFAULT_OPTIONS.delay.maxMs / 1000),
    logLevel: z
      .string()
      .transform((s) => s.toLowerCase())
      .pipe(z.enum(["debug", "info", "warn", "error"]))
      .default("info"),
    profileMarker: z.string().min(1).default(DEFAULT_OPTIONS.profileMarker),
    timeout: seconds.positive().default(DEFAULT_OPTIONS.pageTimeoutMs / 1000),
  })
  .refine((c) => c.minDelay <= c.maxDelay, {
    message: "--min-delay cannot be greater than --max-delay",
    path: ["minDelay"],
  });

export interface HarvestConfig {
  options: HarvestOptions;
  logLevel: LogLevel;
}

/**
 * Environment variables backing each CLI flag
 */
export function rawConfigFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    sitemaps: env.HARVEST_SITEMAPS,
    output: env.HARVEST_OUTPUT,
    limit: env.HARVEST_LIMIT,
    maxWorkers: env.HARVEST_MAX_WORKERS,
    minDelay: env.HARVEST_MIN_DELAY,
    maxDelay: env.HARVEST_MAX_DELAY,
    logLevel: env.LOG_LEVEL,
    profileMarker: env.HARVEST_PROFILE_MARKER,
  };
}

function dropUndefined(raw: RawConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([, v]) => v !== undefined && v !== ""));
}

/**
 * Validate CLI values (taking precedence) over environment values into run options.
 *
 * @throws ConfigurationError when a value is invalid or the delay bounds are inconsistent
 */
export function loadConfig(cli: RawConfig, env: RawConfig = {}): HarvestConfig {
  const result = schema.safeParse({ ...dropUndefined(env), ...dropUndefined(cli) });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  const c = result.data;
  return {
    logLevel: c.logLevel,
    options: {
      ...DEFAULT_OPTIONS,
      sitemaps: c.sitemaps,
      output: c.output,
      limit: c.limit,
      concurrency: c.maxWorkers,
      delay: { minMs: Math.round(c.minDelay * 1000), maxMs: Math.round(c.maxDelay * 1000) },
      profileMarker: c.profileMarker,
      pageTimeoutMs: Math.round(c.timeout * 1000),
    },
  };
}
