/**
 * PubMed citation resolver.
 * Turns PubMed IDs into formatted citation strings via NCBI E-utilities eSummary.
 *
 * API: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db=pubmed&id={ids}&retmode=json
 */

import { z } from "zod";
import { uniqueInOrder } from "../aggregate.js";
import type { ServiceClient } from "../http/client.js";
import { createLogger, type Logger } from "../logger.js";

export const ESUMMARY_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi";

/** eSummary accepts at most this many IDs per request */
export const MAX_IDS_PER_REQUEST = 200;

const ArticleIdSchema = z
  .object({
    idtype: z.string().optional(),
    value: z.string().optional(),
  })
  .passthrough();

export const PubMedSummarySchema = z
  .object({
    authors: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
    pubdate: z.string().optional(),
    title: z.string().optional(),
    source: z.string().optional(),
    articleids: z.array(ArticleIdSchema).optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type PubMedSummary = z.infer<typeof PubMedSummarySchema>;

const ESummaryResponseSchema = z
  .object({
    result: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** Parts of a citation before joining */
export interface CitationParts {
  author: string;
  year: string;
  title: string;
  journal: string;
  doi?: string;
  pmid?: string;
}

/**
 * Join citation parts as "Author (Year). Title. Journal. DOI:x" (or "PMID:x"
 * when there is no DOI). Empty parts are skipped.
 */
export function joinCitation(parts: CitationParts): string {
  const segments = [`${parts.author} (${parts.year})`, parts.title.replace(/\.+$/, ""), parts.journal];
  if (parts.doi) {
    segments.push(`DOI:${parts.doi}`);
  } else if (parts.pmid) {
    segments.push(`PMID:${parts.pmid}`);
  }
  return segments.filter((segment) => segment).join(". ");
}

function firstArticleId(doc: PubMedSummary, idtype: string): string | undefined {
  return doc.articleids?.find((id) => id.idtype === idtype && id.value)?.value;
}

/** Format one eSummary document. */
export function formatPubMedCitation(doc: PubMedSummary): string {
  const authors = doc.authors ?? [];
  const first = authors[0 as number];
  let author = "Unknown";
  if (first) {
    const name = first.name ?? "Unknown";
    author = authors.length > 1 ? `${name} et al.` : name;
  }

  const parts: CitationParts = {
    author,
    year: (doc.pubdate ?? "").slice(0, 4),
    title: doc.title ?? "",
    journal: doc.source ?? "",
  };
  const doi = firstArticleId(doc, "doi");
  const pmid = firstArticleId(doc, "pubmed");
  if (doi) parts.doi = doi;
  if (pmid) parts.pmid = pmid;
  return joinCitation(parts);
}

/** Citation used when an ID cannot be resolved */
export function fallbackCitation(pmid: string): string {
  return `PMID:${pmid}`;
}

export interface CitationResolver {
  /**
   * Resolve PubMed IDs to citation strings.
   * Duplicates are collapsed first; output order follows first occurrence.
   * Every unique ID yields exactly one string. Never rejects.
   */
  resolve(pmids: string[]): Promise<string[]>;
}

export interface CitationResolverOptions {
  logger?: Logger;
  batchSize?: number;
}

/**
 * Create a resolver that queries eSummary through the given NCBI client.
 */
export function createCitationResolver(
  client: ServiceClient,
  options: CitationResolverOptions = {}
): CitationResolver {
  const logger = options.logger ?? createLogger({ level: "warn" });
  const batchSize = options.batchSize ?? MAX_IDS_PER_REQUEST;

  async function resolveBatch(batch: string[]): Promise<string[]> {
    const response = await client.getJson(ESUMMARY_URL, {
      db: "pubmed",
      id: batch.join(","),
      retmode: "json",
      version: "2.0",
    });
    if (!response.ok) {
      logger.warn("Failed to resolve PubMed IDs", { pmids: batch, error: response.error });
      return batch.map(fallbackCitation);
    }

    const parsed = ESummaryResponseSchema.safeParse(response.value);
    const result = parsed.success ? (parsed.data.result ?? {}) : {};

    return batch.map((pmid) => {
      const doc = PubMedSummarySchema.safeParse(result[pmid]);
      if (!doc.success || doc.data.error !== undefined) return fallbackCitation(pmid);
      return formatPubMedCitation(doc.data);
    });
  }

  return {
    async resolve(pmids) {
      const unique = uniqueInOrder(pmids);
      const citations: string[] = [];

      for (let i = 0; i < unique.length; i += batchSize) {
        const batch = unique.slice(i, i + batchSize);
        try {
          citations.push(...(await resolveBatch(batch)));
        } catch (err) {
          logger.warn("Unexpected error resolving PubMed IDs", { pmids: batch, error: String(err) });
          citations.push(...batch.map(fallbackCitation));
        }
      }

      return citations;
    },
  };
}
