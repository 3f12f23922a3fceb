import { describe, it, expect, vi } from "vitest";
import { ConfigurationError } from "../errors.js";
import type { RecordExporter } from "../export/csv-exporter.js";
import { Harvester, harvest, validateHarvestOptions } from "../harvester.js";
import { DEFAULT_OPTIONS, type HarvestOptions, type ProfileRecord } from "../types.js";
import { NO_DELAY } from "../utils/rate-limiter.js";
import {
  createTestLogger,
  fakeSessionFactory,
  jsonLdScript,
  page,
  sitemapIndex,
  urlset,
  type FakeRoutes,
} from "./helpers/fakes.js";

const INDEX = "https://example.com/sitemap-index.xml";
const CHILD = "https://example.com/advisors.xml";
const profile = (slug: string) => `https://example.com/vermoegensberater/${slug}/`;

function memoryExporter() {
  const exported: Array<{ records: readonly ProfileRecord[]; outputPath: string }> = [];
  const exporter: RecordExporter = {
    export: vi.fn(async (records: readonly ProfileRecord[], outputPath: string) => {
      exported.push({ records, outputPath });
    }),
  };
  return { exporter, exported };
}

function siteRoutes(): FakeRoutes {
  return {
    [INDEX]: { body: sitemapIndex([CHILD]) },
    [CHILD]: {
      body: urlset([profile("cora"), "https://example.com/impressum/", profile("anna"), profile("ben")]),
    },
    [profile("anna")]: {
      body: page(jsonLdScript({ "@type": "Person", name: "Anna Example", telephone: "+49 1" })),
    },
    [profile("ben")]: { status: 500 },
    [profile("cora")]: { body: page("<p>Profile under construction</p>") },
  };
}

const baseOptions: Partial<HarvestOptions> = {
  sitemaps: [INDEX],
  output: "out/advisors.csv",
  concurrency: 2,
  delay: NO_DELAY,
};

describe("validateHarvestOptions", () => {
  it("accepts the defaults", () => {
    expect(() => validateHarvestOptions(DEFAULT_OPTIONS)).not.toThrow();
  });

  it("rejects a minimum delay above the maximum", () => {
    expect(() =>
      validateHarvestOptions({ ...DEFAULT_OPTIONS, delay: { minMs: 900, maxMs: 100 } })
    ).toThrow("Invalid configuration: minimum delay (900ms) cannot be greater than maximum delay (100ms)");
  });

  it("collects every problem into one error", () => {
    try {
      validateHarvestOptions({ ...DEFAULT_OPTIONS, sitemaps: [], concurrency: 0, profileMarker: " " });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          "at least one seed sitemap is required",
          "concurrency must be a positive integer (got 0)",
          "profile marker must not be empty",
        ]);
      }
    }
  });

  it("rejects negative delays and fractional limits", () => {
    expect(() =>
      validateHarvestOptions({ ...DEFAULT_OPTIONS, delay: { minMs: -1, maxMs: 0 } })
    ).toThrow("delays must not be negative");
    expect(() => validateHarvestOptions({ ...DEFAULT_OPTIONS, limit: 1.5 })).toThrow(
      "limit must be a non-negative integer (got 1.5)"
    );
  });
});

describe("Harvester", () => {
  it("walks the sitemaps, fetches profiles and exports the records", async () => {
    const { sessions, createSession } = fakeSessionFactory(siteRoutes());
    const { exporter, exported } = memoryExporter();
    const logger = createTestLogger();

    const summary = await new Harvester(baseOptions, { createSession, exporter, logger }).run();

    expect(summary).toMatchObject({
      status: "exported",
      profileUrls: 3,
      records: 2,
      emptyRecords: 1,
      outputPath: "out/advisors.csv",
    });
    expect(summary.failures).toEqual([
      { url: profile("ben"), reason: `HTTP 500 for ${profile("ben")}`, statusCode: 500 },
    ]);

    expect(exported).toHaveLength(1);
    expect(exported[0].outputPath).toBe("out/advisors.csv");
    const names = exported[0].records.map((r) => r.name).sort();
    expect(names).toEqual(["Anna Example", null]);

    // one walk session plus one per worker
    expect(sessions).toHaveLength(3);
    expect(sessions.every((s) => s.closed)).toBe(true);
    expect(sessions[0].requests).toEqual([INDEX, CHILD]);

    expect(logger.info).toHaveBeenCalledWith(`Seed sitemaps: ${INDEX}`);
    expect(logger.info).toHaveBeenCalledWith("Starting download of 3 profiles");
  });

  it("applies the limit after sorting", async () => {
    const { sessions, createSession } = fakeSessionFactory(siteRoutes());
    const { exporter } = memoryExporter();
    const logger = createTestLogger();

    const summary = await new Harvester(
      { ...baseOptions, limit: 1 },
      { createSession, exporter, logger }
    ).run();

    expect(summary.profileUrls).toBe(1);
    expect(summary.records).toBe(1);
    expect(sessions.slice(1).flatMap((s) => s.requests)).toEqual([profile("anna")]);
    expect(logger.info).toHaveBeenCalledWith("Processing only 1 profiles because of the limit");
  });

  it("stops without exporting when no profile URL is found", async () => {
    const { sessions, createSession } = fakeSessionFactory({ [INDEX]: { body: urlset([]) } });
    const { exporter } = memoryExporter();
    const logger = createTestLogger();

    const summary = await new Harvester(baseOptions, { createSession, exporter, logger }).run();

    expect(summary.status).toBe("no-profiles");
    expect(summary.records).toBe(0);
    expect(exporter.export).not.toHaveBeenCalled();
    expect(sessions).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith("No profile URLs were found. Check the seed sitemaps.");
  });

  it("stops without exporting when every page fails", async () => {
    const { createSession } = fakeSessionFactory({
      [INDEX]: { body: urlset([profile("anna"), profile("ben")]) },
      [profile("anna")]: { status: 403 },
      [profile("ben")]: { networkError: "socket hang up" },
    });
    const { exporter } = memoryExporter();
    const logger = createTestLogger();

    const summary = await new Harvester(baseOptions, { createSession, exporter, logger }).run();

    expect(summary.status).toBe("no-records");
    expect(summary.profileUrls).toBe(2);
    expect(summary.failures).toHaveLength(2);
    expect(exporter.export).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      "No profile could be retrieved. Check the logs for details."
    );
  });

  it("includes sitemap failures in the summary", async () => {
    const missing = "https://example.com/missing.xml";
    const routes = siteRoutes();
    const { createSession } = fakeSessionFactory(routes);
    const { exporter } = memoryExporter();

    const summary = await new Harvester(
      { ...baseOptions, sitemaps: [missing, INDEX] },
      { createSession, exporter, logger: createTestLogger() }
    ).run();

    expect(summary.status).toBe("exported");
    expect(summary.failures.map((f) => f.url)).toEqual([missing, profile("ben")]);
  });

  it("rejects inconsistent options before touching the network", async () => {
    const createSession = vi.fn();
    const harvester = new Harvester(
      { ...baseOptions, delay: { minMs: 900, maxMs: 100 } },
      { createSession, logger: createTestLogger() }
    );

    await expect(harvester.run()).rejects.toBeInstanceOf(ConfigurationError);
    expect(createSession).not.toHaveBeenCalled();
  });

  it("forwards progress to the callback", async () => {
    const { createSession } = fakeSessionFactory(siteRoutes());
    const { exporter } = memoryExporter();
    const onProgress = vi.fn();

    await harvest(baseOptions, { createSession, exporter, logger: createTestLogger(), onProgress });

    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenLastCalledWith(expect.objectContaining({ completed: 3, total: 3 }));
  });
});
