/**
 * # accession-metadata
 *
 * Normalized metadata for public biological dataset accessions.
 *
 * Supported archives:
 *
 * - **GEO** series (`GSE…`) via NCBI E-utilities and the series family SOFT file
 * - **ENA** studies (`ERP…`, `SRP…`, `DRP…`) via the ENA Portal and Xref APIs
 *
 * Each accession yields one {@link MetadataRecord}. Fetches never throw:
 * failures are reported through `fetchStatus` (`success`, `partial` or `error`)
 * and `errorMessage`. Publications are resolved to citation strings through
 * PubMed, falling back to a Europe PMC full-text search.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { createMetadataGrabber, formatRecords } from "accession-metadata";
 *
 * const grabber = createMetadataGrabber({ ncbiEmail: "you@example.com" });
 * const records = await grabber.fetchAll(["GSE149739", "ERP123456"], { concurrency: 2 });
 *
 * for (const record of records) {
 *   console.log(record.accession, record.fetchStatus, record.species);
 * }
 * process.stdout.write(formatRecords(records, "tsv"));
 * ```
 *
 * ## Rate limits
 *
 * NCBI allows 3 requests/sec without an API key and 10 with one; EBI services
 * share 20 requests/sec. Limits are enforced per grabber instance.
 *
 * @packageDocumentation
 */

// Types
export type {
  FetchStatus,
  MetadataRecord,
  OutputColumn,
  SequencingType,
  SourceAdapter,
} from "./types.js";
export { OUTPUT_COLUMNS } from "./types.js";

// Dispatcher
export {
  createDispatcher,
  createMetadataGrabber,
  detectPrefix,
  EBI_RATE,
  NCBI_RATE,
  NCBI_RATE_WITH_KEY,
} from "./grabber.js";
export type { FetchAllOptions, FetchProgress, GrabberOptions, MetadataGrabber } from "./grabber.js";

// Records
export { createRecord, errorRecord, markPartial } from "./record.js";

// HTTP
export { RateLimiter } from "./http/rate-limiter.js";
export type { RateLimiterOptions } from "./http/rate-limiter.js";
export {
  backoffDelay,
  classifyStatus,
  createServiceClient,
  DOWNLOAD_TIMEOUT_MS,
  METADATA_TIMEOUT_MS,
} from "./http/client.js";
export type { HttpResult, RetryOptions, ServiceClient, ServiceClientOptions } from "./http/client.js";

// Citations
export { createCitationResolver, formatPubMedCitation, joinCitation } from "./citations/pubmed.js";
export type { CitationParts, CitationResolver } from "./citations/pubmed.js";
export { createLiteratureSearch, formatEuropePmcCitation } from "./citations/europepmc.js";
export type { LiteratureSearch } from "./citations/europepmc.js";

// Sources
export { createEnaAdapter, createGeoAdapter, createSourceAdapters } from "./sources/index.js";
export type { SourceClients, SourceDeps } from "./sources/index.js";
export { accessionToUid, buildSoftUrl } from "./sources/geo.js";
export { parseSampleSoft } from "./sources/geo-soft.js";
export type { SoftSummary } from "./sources/geo-soft.js";

// Aggregation
export { classifySequencingType, mostCommon, unionSorted } from "./aggregate.js";

// Output
export { formatRecords, summarizeStatuses, toRow, writeRecords } from "./output.js";
export type { OutputFormat, StatusCounts } from "./output.js";

// Configuration, logging and errors
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";
export { ConfigError, InvalidAccessionError } from "./errors.js";
