/**
 * NCBI GEO source adapter for GSE series accessions.
 *
 * eSummary: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db=gds&id={uid}&retmode=json
 * eLink:    https://eutils.ncbi.nlm.nih.gov/entrez/eutils/elink.fcgi?dbfrom=gds&db=pubmed&id={uid}&retmode=json
 * SOFT:     https://ftp.ncbi.nlm.nih.gov/geo/series/GSE{stem}nnn/{acc}/soft/{acc}_family.soft.gz
 */

import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import { z } from "zod";
import { uniqueInOrder } from "../aggregate.js";
import type { LiteratureSearch } from "../citations/europepmc.js";
import type { CitationResolver } from "../citations/pubmed.js";
import { describeError, InvalidAccessionError } from "../errors.js";
import { DOWNLOAD_TIMEOUT_MS, type HttpResult, type ServiceClient } from "../http/client.js";
import { createLogger, type Logger } from "../logger.js";
import { createRecord, errorRecord, markPartial } from "../record.js";
import type { MetadataRecord, SourceAdapter } from "../types.js";
import { parseSampleSoft, type SoftSummary } from "./geo-soft.js";

const gunzipAsync = promisify(gunzip);

export const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
export const GEO_FTP_BASE = "https://ftp.ncbi.nlm.nih.gov/geo/series";

/** GEO series UIDs in the gds database are the series number offset by this value */
export const GEO_UID_OFFSET = 200_000_000;

const GSE_PATTERN = /^GSE(\d+)$/i;

const idLike = z.union([z.string(), z.number()]).transform(String);

export const GdsSummarySchema = z
  .object({
    accession: z.string().optional(),
    title: z.string().optional(),
    summary: z.string().optional(),
    taxon: z.string().optional(),
    gdstype: z.string().optional(),
    gpl: idLike.optional(),
    pdat: z.string().optional(),
    n_samples: idLike.optional(),
    pubmedids: z.array(idLike).optional(),
    bioproject: z.string().optional(),
    extrelations: z
      .array(
        z
          .object({
            relationtype: z.string().optional(),
            targetobject: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type GdsSummary = z.infer<typeof GdsSummarySchema>;

const ESummaryResponseSchema = z
  .object({
    result: z.record(z.unknown()).optional(),
  })
  .passthrough();

const ELinkResponseSchema = z
  .object({
    linksets: z
      .array(
        z
          .object({
            linksetdbs: z
              .array(
                z
                  .object({
                    linkname: z.string().optional(),
                    links: z.array(idLike).optional(),
                  })
                  .passthrough()
              )
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

/** Numeric part of a GSE accession; throws InvalidAccessionError for anything else */
function seriesNumber(accession: string): string {
  const match = GSE_PATTERN.exec(accession.trim());
  const digits = match?.[1 as number];
  if (!digits) throw new InvalidAccessionError(accession, "GSE");
  return digits;
}

/**
 * Map a GSE accession to its gds UID: GSE149739 → 200149739.
 * @throws InvalidAccessionError if the accession is not GSE followed by digits
 */
export function accessionToUid(accession: string): number {
  return GEO_UID_OFFSET + Number.parseInt(seriesNumber(accession), 10);
}

/**
 * Build the family SOFT download URL.
 * The directory stem replaces the last three digits with "nnn":
 * GSE261596 → GSE261nnn/GSE261596, GSE100 → GSEnnn/GSE100.
 */
export function buildSoftUrl(accession: string): string {
  const digits = seriesNumber(accession);
  const canonical = `GSE${digits}`;
  const stem = digits.length > 3 ? digits.slice(0, -3) : "";
  return `${GEO_FTP_BASE}/GSE${stem}nnn/${canonical}/soft/${canonical}_family.soft.gz`;
}

function isGzip(bytes: Buffer): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/** Build the free-text details: "Title. Summary (n=N samples)" */
function buildDetails(doc: GdsSummary, softSampleCount: number): string {
  let details = [doc.title, doc.summary].filter((part) => part).join(". ");
  const sampleCount = doc.n_samples || (softSampleCount > 0 ? String(softSampleCount) : "");
  if (sampleCount) {
    details += `${details ? " " : ""}(n=${sampleCount} samples)`;
  }
  return details;
}

/** Cross-references in discovery order: BioProject, external relations, platform */
export function collectGeoReferences(doc: GdsSummary): string[] {
  const refs: string[] = [];
  if (doc.bioproject) refs.push(`BioProject:${doc.bioproject}`);
  for (const relation of doc.extrelations ?? []) {
    if (relation.relationtype && relation.targetobject) {
      refs.push(`${relation.relationtype}:${relation.targetobject}`);
    }
  }
  if (doc.gpl) refs.push(`GEO_Platform:GPL${doc.gpl}`);
  return refs;
}

export interface GeoAdapterDeps {
  /** NCBI E-utilities client (carries api_key/tool/email) */
  eutils: ServiceClient;
  /** Client for the GEO FTP-over-HTTPS host; shares the NCBI limiter */
  ftp: ServiceClient;
  citations: CitationResolver;
  literature: LiteratureSearch;
  logger?: Logger;
  /** Timeout for the SOFT download (default: 90000) */
  downloadTimeoutMs?: number;
}

/**
 * Create the GEO adapter.
 */
export function createGeoAdapter(deps: GeoAdapterDeps): SourceAdapter {
  const logger = deps.logger ?? createLogger({ level: "warn" });
  const downloadTimeoutMs = deps.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS;

  async function fetchSummary(uid: number): Promise<HttpResult<GdsSummary>> {
    const response = await deps.eutils.getJson(`${EUTILS_BASE}/esummary.fcgi`, {
      db: "gds",
      id: String(uid),
      retmode: "json",
      version: "2.0",
    });
    if (!response.ok) {
      return { ok: false, error: `eSummary request failed: ${response.error}` };
    }

    const parsed = ESummaryResponseSchema.safeParse(response.value);
    const raw = parsed.success ? parsed.data.result?.[String(uid)] : undefined;
    const doc = GdsSummarySchema.safeParse(raw);
    if (raw === undefined || !doc.success || doc.data.error !== undefined) {
      return { ok: false, error: "eSummary returned no data" };
    }
    return { ok: true, value: doc.data };
  }

  async function fetchLinkedPmids(uid: number): Promise<string[]> {
    const response = await deps.eutils.getJson(`${EUTILS_BASE}/elink.fcgi`, {
      dbfrom: "gds",
      db: "pubmed",
      id: String(uid),
      retmode: "json",
    });
    if (!response.ok) {
      logger.warn("GEO eLink lookup failed", { uid, error: response.error });
      return [];
    }

    const parsed = ELinkResponseSchema.safeParse(response.value);
    if (!parsed.success) return [];

    const pmids: string[] = [];
    for (const linkset of parsed.data.linksets ?? []) {
      for (const linksetdb of linkset.linksetdbs ?? []) {
        if (linksetdb.linkname === "gds_pubmed") {
          pmids.push(...(linksetdb.links ?? []));
        }
      }
    }
    return pmids;
  }

  async function fetchSoftSummary(accession: string): Promise<HttpResult<SoftSummary>> {
    const response = await deps.ftp.getBytes(buildSoftUrl(accession), undefined, {
      timeoutMs: downloadTimeoutMs,
    });
    if (!response.ok) {
      return { ok: false, error: `SOFT download failed: ${response.error}` };
    }

    let text: string;
    try {
      const bytes = isGzip(response.value) ? await gunzipAsync(response.value) : response.value;
      text = bytes.toString("utf-8");
    } catch (err) {
      return { ok: false, error: `Failed to decompress SOFT file: ${describeError(err)}` };
    }
    return { ok: true, value: parseSampleSoft(text) };
  }

  async function resolveCitations(accession: string, doc: GdsSummary, uid: number): Promise<string[]> {
    const linked = await fetchLinkedPmids(uid);
    const pmids = uniqueInOrder([...(doc.pubmedids ?? []), ...linked]);
    if (pmids.length > 0) {
      return deps.citations.resolve(pmids);
    }
    return deps.literature.searchCitations([accession]);
  }

  async function fetchRecord(accession: string): Promise<MetadataRecord> {
    let uid: number;
    try {
      uid = accessionToUid(accession);
    } catch (err) {
      return errorRecord(accession, describeError(err));
    }

    // 1. Series summary (fatal on failure)
    const summary = await fetchSummary(uid);
    if (!summary.ok) return errorRecord(accession, summary.error);
    const doc = summary.value;

    const record = createRecord(accession);
    record.species = doc.taxon ?? "";
    record.dataType = doc.gdstype ?? "";
    record.platform = doc.gpl ? `GPL${doc.gpl}` : "";
    record.dateDeposited = (doc.pdat ?? "").replaceAll("/", "-");

    // 2. Cross-references
    record.databaseReferences = collectGeoReferences(doc).join("; ");

    // 3. Sample-level fields from the family SOFT file
    const soft = await fetchSoftSummary(accession);
    if (soft.ok) {
      record.tissue = soft.value.tissue;
      record.age = soft.value.age;
      record.sequencingType = soft.value.sequencingType;
    } else {
      logger.warn("GEO sample metadata unavailable", { accession, error: soft.error });
      markPartial(record, soft.error);
    }
    record.experimentalDetails = buildDetails(doc, soft.ok ? soft.value.sampleCount : 0);

    // 4. Publications
    record.publishedWorks = (await resolveCitations(accession, doc, uid)).join("; ");

    return record;
  }

  return {
    name: "GEO",
    prefixes: () => ["GSE"],
    async fetch(accession) {
      try {
        return await fetchRecord(accession);
      } catch (err) {
        logger.error("Unexpected error fetching GEO accession", { accession, error: describeError(err) });
        return errorRecord(accession, `Unexpected error: ${describeError(err)}`);
      }
    },
  };
}
