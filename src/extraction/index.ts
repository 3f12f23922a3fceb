export { parseProfilePage, type ProfileParser } from "./profile-parser.js";

export {
  candidateFromJsonLd,
  findProfileNodes,
  hasProfileType,
  parseJsonLdPayload,
  PROFILE_SCHEMA_TYPES,
  type JsonLdNode,
  type JsonLdParseResult,
} from "./json-ld.js";

export { candidateFromMicrodata, extractMailto } from "./microdata.js";

export {
  assignPhones,
  cleanText,
  createRecord,
  emptyCandidate,
  hasContactSignal,
  mergeRecords,
  needsFallback,
} from "./record.js";
