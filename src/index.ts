export { Harvester, harvest, validateHarvestOptions, type HarvesterDeps } from "./harvester.js";

export {
  DEFAULT_OPTIONS,
  DEFAULT_PROFILE_MARKER,
  RECORD_COLUMNS,
  type FetchFailure,
  type HarvestOptions,
  type HarvestProgress,
  type HarvestStatus,
  type HarvestSummary,
  type ProfileCandidate,
  type ProfileRecord,
} from "./types.js";

export { loadConfig, rawConfigFromEnv, type HarvestConfig, type RawConfig } from "./config.js";

export {
  collectProfileUrls,
  classifyLocation,
  parseLocations,
  type SitemapWalkOptions,
  type SitemapWalkResult,
} from "./discovery/index.js";

export * from "./extraction/index.js";

export { fetchProfiles, type FetchPipelineOptions, type PipelineResult } from "./pipeline/fetch-pipeline.js";

export {
  CsvRecordExporter,
  renderCsv,
  type RecordExporter,
} from "./export/csv-exporter.js";

export {
  KeepAliveSession,
  createSessionFactory,
  type FetchOutcome,
  type HttpSession,
  type SessionFactory,
} from "./http/session.js";

export {
  HarvestError,
  HarvestErrorCode,
  TransportError,
  HttpStatusError,
  MalformedDocumentError,
  ConfigurationError,
} from "./errors.js";

export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
export { type DelayRange } from "./utils/rate-limiter.js";
