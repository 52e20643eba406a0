/**
 * Accession dispatcher.
 * Routes each accession to the adapter that owns its prefix and collects records in input order.
 */

import { createLiteratureSearch } from "./citations/europepmc.js";
import { createCitationResolver } from "./citations/pubmed.js";
import {
  createServiceClient,
  DOWNLOAD_TIMEOUT_MS,
  type RetryOptions,
  type ServiceClient,
} from "./http/client.js";
import { RateLimiter } from "./http/rate-limiter.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { errorRecord } from "./record.js";
import { createSourceAdapters } from "./sources/index.js";
import type { FetchStatus, MetadataRecord, SourceAdapter } from "./types.js";

/** NCBI allows 3 requests/sec without an API key and 10 with one */
export const NCBI_RATE = 3;
export const NCBI_RATE_WITH_KEY = 10;
/** Shared budget for EBI services */
export const EBI_RATE = 20;

export interface FetchProgress {
  completed: number;
  total: number;
  accession: string;
  status: FetchStatus;
}

export interface FetchAllOptions {
  /** Accessions fetched at once (default: 1, sequential) */
  concurrency?: number;
  onProgress?: (progress: FetchProgress) => void;
}

export interface MetadataGrabber {
  /** Fetch one accession. Never rejects. */
  fetchOne(accession: string): Promise<MetadataRecord>;
  /** Fetch many accessions; result[i] always belongs to accessions[i]. Never rejects. */
  fetchAll(accessions: string[], options?: FetchAllOptions): Promise<MetadataRecord[]>;
}

export interface GrabberOptions {
  /** NCBI API key; raises the NCBI rate limit and is sent with every NCBI request */
  ncbiApiKey?: string;
  /** Contact email sent to NCBI */
  ncbiEmail?: string;
  /** Tool name sent to NCBI */
  ncbiTool?: string;
  /** Requests/second overrides per service */
  rates?: { ncbi?: number; ebi?: number };
  /** Retry and timeout overrides for every service client */
  http?: RetryOptions & { timeoutMs?: number; downloadTimeoutMs?: number; sleep?: (ms: number) => Promise<void> };
  logger?: Logger;
}

/**
 * Leading alphabetic run of an accession, upper-cased: "gse149739" → "GSE".
 * Returns null when the accession does not start with a letter.
 */
export function detectPrefix(accession: string): string | null {
  const match = /^([A-Za-z]+)/.exec(accession.trim());
  return match?.[1 as number]?.toUpperCase() ?? null;
}

/**
 * Build a dispatcher over a fixed set of adapters.
 * The prefix table is built once; a later adapter claiming the same prefix wins.
 */
export function createDispatcher(adapters: SourceAdapter[], logger: Logger): MetadataGrabber {
  const prefixMap = new Map<string, SourceAdapter>();
  for (const adapter of adapters) {
    for (const prefix of adapter.prefixes()) {
      prefixMap.set(prefix.toUpperCase(), adapter);
    }
  }

  async function fetchOne(rawAccession: string): Promise<MetadataRecord> {
    const accession = rawAccession.trim();
    const prefix = detectPrefix(accession);
    const adapter = prefix ? prefixMap.get(prefix) : undefined;
    if (!adapter) {
      return errorRecord(accession, `Unsupported accession prefix: ${prefix || accession || "(empty)"}`);
    }

    logger.info(`Fetching ${accession} via ${adapter.name}`);
    try {
      return await adapter.fetch(accession);
    } catch (err) {
      // Adapters are expected to report failures on the record
      logger.error("Adapter rejected", { accession, error: describeError(err) });
      return errorRecord(accession, `Unexpected error: ${describeError(err)}`);
    }
  }

  async function fetchAll(
    accessions: string[],
    options?: FetchAllOptions
  ): Promise<MetadataRecord[]> {
    const requested = options?.concurrency ?? 1;
    const concurrency = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : 1;
    const results: MetadataRecord[] = new Array(accessions.length);
    let nextIndex = 0;
    let completed = 0;

    async function worker(): Promise<void> {
      while (nextIndex < accessions.length) {
        const index = nextIndex++;
        const accession = accessions[index] ?? "";

        const record = await fetchOne(accession);
        results[index] = record;
        completed++;

        if (options?.onProgress) {
          try {
            options.onProgress({
              completed,
              total: accessions.length,
              accession: record.accession,
              status: record.fetchStatus,
            });
          } catch (err) {
            logger.warn("Progress callback failed", { accession: record.accession, error: describeError(err) });
          }
        }
      }
    }

    const workers = Array.from({ length: Math.min(concurrency, accessions.length) }, () => worker());
    await Promise.all(workers);

    return results;
  }

  return { fetchOne, fetchAll };
}

/**
 * Create a grabber with one rate limiter per external service.
 * NCBI E-utilities and the GEO download host share the NCBI limiter;
 * ENA and Europe PMC share the EBI limiter.
 */
export function createMetadataGrabber(options: GrabberOptions = {}): MetadataGrabber {
  const logger = options.logger ?? createLogger({ level: "warn" });
  const http = options.http ?? {};

  const ncbiLimiter = new RateLimiter(
    options.rates?.ncbi ?? (options.ncbiApiKey ? NCBI_RATE_WITH_KEY : NCBI_RATE)
  );
  const ebiLimiter = new RateLimiter(options.rates?.ebi ?? EBI_RATE);

  const ncbiParams: Record<string, string> = {};
  if (options.ncbiApiKey) ncbiParams.api_key = options.ncbiApiKey;
  if (options.ncbiTool) ncbiParams.tool = options.ncbiTool;
  if (options.ncbiEmail) ncbiParams.email = options.ncbiEmail;

  const client = (name: string, limiter: RateLimiter, defaultParams?: Record<string, string>): ServiceClient =>
    createServiceClient({
      name,
      limiter,
      logger,
      ...(defaultParams ? { defaultParams } : {}),
      ...(http.retries !== undefined ? { retries: http.retries } : {}),
      ...(http.retryDelay !== undefined ? { retryDelay: http.retryDelay } : {}),
      ...(http.maxRetryDelay !== undefined ? { maxRetryDelay: http.maxRetryDelay } : {}),
      ...(http.timeoutMs !== undefined ? { timeoutMs: http.timeoutMs } : {}),
      ...(http.sleep ? { sleep: http.sleep } : {}),
    });

  const eutils = client("NCBI E-utilities", ncbiLimiter, ncbiParams);
  const ftp = client("NCBI GEO download", ncbiLimiter);
  const ebi = client("EBI", ebiLimiter);

  const adapters = createSourceAdapters({
    clients: { eutils, ftp, ebi },
    citations: createCitationResolver(eutils, { logger }),
    literature: createLiteratureSearch(ebi, { logger }),
    logger,
    downloadTimeoutMs: http.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS,
  });

  return createDispatcher(adapters, logger);
}
