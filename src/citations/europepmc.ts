/**
 * Europe PMC literature search.
 * Fallback citation source: finds articles that mention an accession in their full text.
 *
 * API: https://www.ebi.ac.uk/europepmc/webservices/rest/search?query={q}&format=json&resultType=lite
 */

import { z } from "zod";
import type { ServiceClient } from "../http/client.js";
import { createLogger, type Logger } from "../logger.js";
import { joinCitation, type CitationParts } from "./pubmed.js";

export const EUROPEPMC_SEARCH_URL = "https://www.ebi.ac.uk/europepmc/webservices/rest/search";

/** Results taken per search term */
const PAGE_SIZE = 5;

const idLike = z.union([z.string(), z.number()]).transform(String);

const EuropePmcResultSchema = z
  .object({
    pmid: idLike.optional(),
    authorString: z.string().optional(),
    pubYear: idLike.optional(),
    title: z.string().optional(),
    journalTitle: z.string().optional(),
    doi: z.string().optional(),
  })
  .passthrough();

export type EuropePmcResult = z.infer<typeof EuropePmcResultSchema>;

const EuropePmcResponseSchema = z
  .object({
    resultList: z
      .object({
        result: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Format a Europe PMC "lite" search hit. */
export function formatEuropePmcCitation(item: EuropePmcResult): string {
  const parts: CitationParts = {
    author: item.authorString || "Unknown",
    year: item.pubYear ?? "",
    title: item.title ?? "",
    journal: item.journalTitle ?? "",
  };
  if (item.doi) parts.doi = item.doi;
  if (item.pmid) parts.pmid = item.pmid;
  return joinCitation(parts);
}

export interface LiteratureSearch {
  /**
   * Search for each non-empty term and return citations for every distinct
   * PMID found, in discovery order. Failed searches are skipped. Never rejects.
   */
  searchCitations(terms: string[]): Promise<string[]>;
}

export interface LiteratureSearchOptions {
  logger?: Logger;
}

export function createLiteratureSearch(
  client: ServiceClient,
  options: LiteratureSearchOptions = {}
): LiteratureSearch {
  const logger = options.logger ?? createLogger({ level: "warn" });

  async function search(term: string): Promise<EuropePmcResult[]> {
    const response = await client.getJson(EUROPEPMC_SEARCH_URL, {
      query: term,
      format: "json",
      resultType: "lite",
      pageSize: String(PAGE_SIZE),
    });
    if (!response.ok) {
      logger.warn("Europe PMC search failed", { term, error: response.error });
      return [];
    }

    const parsed = EuropePmcResponseSchema.safeParse(response.value);
    if (!parsed.success) return [];

    const items: EuropePmcResult[] = [];
    for (const raw of parsed.data.resultList?.result ?? []) {
      const item = EuropePmcResultSchema.safeParse(raw);
      if (item.success) items.push(item.data);
    }
    return items;
  }

  return {
    async searchCitations(terms) {
      const citations: string[] = [];
      const seenPmids = new Set<string>();

      for (const term of terms) {
        if (!term) continue;
        for (const item of await search(term)) {
          if (!item.pmid || seenPmids.has(item.pmid)) continue;
          seenPmids.add(item.pmid);
          citations.push(formatEuropePmcCitation(item));
        }
      }

      return citations;
    },
  };
}
