export {
  WhoisApiClient,
  DEFAULT_WHOIS_API_BASE,
  DEFAULT_WHOIS_TIMEOUT_MS,
} from './WhoisApiClient.js';
export type { WhoisApiClientConfig } from './WhoisApiClient.js';
export {
  normalizeDomain,
  formatWhoisSummary,
  formatRawWhois,
  formatLookupError,
} from './formatters.js';
export type { LookupErrorFormatOptions } from './formatters.js';
export {
  WhoisRecordSchema,
  ParsedWhoisDataSchema,
  WhoisHealthSchema,
} from './types.js';
export type {
  IWhoisApiClient,
  ParsedWhoisData,
  WhoisHealth,
  WhoisLookupOptions,
  WhoisLookupResult,
  WhoisRecord,
} from './types.js';
