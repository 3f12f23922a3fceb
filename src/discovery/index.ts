export {
  collectProfileUrls,
  classifyLocation,
  parseLocations,
  maybeGunzip,
  SITEMAP_NAMESPACE,
  type LocationKind,
  type LocationParseResult,
  type SitemapWalkOptions,
  type SitemapWalkResult,
} from "./sitemap-walker.js";
