/**
 * ENA source adapter for secondary study accessions (ERP, SRP, DRP).
 *
 * Portal API: https://www.ebi.ac.uk/ena/portal/api/search?result={study|read_study}&query=...&format=json
 * Xref:       https://www.ebi.ac.uk/ena/xref/rest/json/search?accession={acc}
 * Rate limit: shared EBI budget (20 req/sec by default)
 */

import { z } from "zod";
import { classifySequencingType, mostCommon, uniqueInOrder, unionSorted } from "../aggregate.js";
import type { LiteratureSearch } from "../citations/europepmc.js";
import type { CitationResolver } from "../citations/pubmed.js";
import { describeError } from "../errors.js";
import type { HttpResult, ServiceClient } from "../http/client.js";
import { createLogger, type Logger } from "../logger.js";
import { createRecord, errorRecord, markPartial } from "../record.js";
import type { MetadataRecord, SourceAdapter } from "../types.js";

export const PORTAL_API_URL = "https://www.ebi.ac.uk/ena/portal/api/search";
export const XREF_URL = "https://www.ebi.ac.uk/ena/xref/rest/json/search";

/** Run-level fields requested from the read_study result */
export const RUN_FIELDS = [
  "scientific_name",
  "instrument_platform",
  "library_strategy",
  "library_source",
  "tissue_type",
  "age",
  "cell_type",
] as const;

const DEFAULT_RUN_PAGE_SIZE = 100;
const DEFAULT_MAX_RUNS = 1000;

/** Portal values are strings, but tolerate numbers and nulls */
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

export const StudySchema = z
  .object({
    study_accession: text,
    secondary_study_accession: text,
    study_title: text,
    study_description: text,
    description: text,
    scientific_name: text,
    center_name: text,
    first_public: text,
    geo_accession: text,
    study_alias: text,
  })
  .passthrough();

export type EnaStudy = z.infer<typeof StudySchema>;

export const RunSchema = z
  .object({
    scientific_name: text,
    instrument_platform: text,
    library_strategy: text,
    library_source: text,
    tissue_type: text,
    age: text,
    cell_type: text,
  })
  .passthrough();

export type EnaRun = z.infer<typeof RunSchema>;

export const XrefSchema = z
  .object({
    Source: text,
    "Source Primary Accession": text,
    "Source Secondary Accession": text,
  })
  .passthrough();

export type EnaXref = z.infer<typeof XrefSchema>;

/** Parse an array body, keeping only rows that match the schema */
function parseRows<T extends z.ZodTypeAny>(schema: T, value: unknown): Array<z.output<T>> | null {
  if (value === null) return [];
  if (!Array.isArray(value)) return null;
  const rows: Array<z.output<T>> = [];
  for (const item of value) {
    const parsed = schema.safeParse(item);
    if (parsed.success) rows.push(parsed.data);
  }
  return rows;
}

function studyQuery(accession: string): string {
  return `secondary_study_accession="${accession}"`;
}

/** Run-level values merged across all runs */
export interface RunSummary {
  runCount: number;
  species: string;
  platform: string;
  dataType: string;
  tissue: string;
  age: string;
  sequencingType: MetadataRecord["sequencingType"];
}

/**
 * Aggregate run rows: most common value per field, all distinct ages,
 * tissue falling back to cell type.
 */
export function summarizeRuns(runs: EnaRun[]): RunSummary {
  const tissue = mostCommon(runs.map((run) => run.tissue_type));
  return {
    runCount: runs.length,
    species: mostCommon(runs.map((run) => run.scientific_name)),
    platform: mostCommon(runs.map((run) => run.instrument_platform)),
    dataType: mostCommon(runs.map((run) => run.library_strategy)),
    tissue: tissue || mostCommon(runs.map((run) => run.cell_type)),
    age: unionSorted(runs.map((run) => run.age)),
    sequencingType: classifySequencingType(
      runs.map((run) => run.library_source),
      []
    ),
  };
}

/** "Title. Description (Center: X)" */
function buildDetails(study: EnaStudy): string {
  let details = [study.study_title, study.study_description || study.description]
    .filter((part) => part)
    .join(". ");
  if (study.center_name) {
    details += `${details ? " " : ""}(Center: ${study.center_name})`;
  }
  return details;
}

export interface EnaAdapterDeps {
  /** EBI client shared with Europe PMC */
  ebi: ServiceClient;
  citations: CitationResolver;
  literature: LiteratureSearch;
  logger?: Logger;
  /** Runs requested per page (default: 100) */
  runPageSize?: number;
  /** Upper bound on runs aggregated per study (default: 1000) */
  maxRuns?: number;
}

interface RunLookup {
  runs: EnaRun[];
  error?: string;
}

/**
 * Create the ENA adapter.
 */
export function createEnaAdapter(deps: EnaAdapterDeps): SourceAdapter {
  const logger = deps.logger ?? createLogger({ level: "warn" });
  const pageSize = deps.runPageSize ?? DEFAULT_RUN_PAGE_SIZE;
  const maxRuns = deps.maxRuns ?? DEFAULT_MAX_RUNS;

  async function fetchStudy(accession: string): Promise<HttpResult<EnaStudy>> {
    const response = await deps.ebi.getJson(PORTAL_API_URL, {
      result: "study",
      query: studyQuery(accession),
      format: "json",
      fields: "all",
    });
    if (!response.ok) {
      return { ok: false, error: `ENA Portal API request failed: ${response.error}` };
    }

    const study = parseRows(StudySchema, response.value)?.[0 as number];
    if (!study) return { ok: false, error: "ENA Portal API returned no study data" };
    return { ok: true, value: study };
  }

  async function fetchRuns(accession: string): Promise<RunLookup> {
    const runs: EnaRun[] = [];

    for (let offset = 0; offset < maxRuns; offset += pageSize) {
      const limit = Math.min(pageSize, maxRuns - offset);
      const response = await deps.ebi.getJson(PORTAL_API_URL, {
        result: "read_study",
        query: studyQuery(accession),
        format: "json",
        fields: RUN_FIELDS.join(","),
        limit: String(limit),
        offset: String(offset),
      });
      if (!response.ok) {
        return { runs, error: `ENA run lookup failed: ${response.error}` };
      }

      const page = parseRows(RunSchema, response.value);
      if (!page) {
        return { runs, error: "ENA run lookup returned an unexpected response" };
      }
      runs.push(...page);
      if (page.length < limit) break;
    }

    return { runs };
  }

  async function fetchXrefs(accession: string): Promise<EnaXref[]> {
    const response = await deps.ebi.getJson(XREF_URL, { accession });
    if (!response.ok) {
      logger.warn("ENA xref lookup failed", { accession, error: response.error });
      return [];
    }
    return parseRows(XrefSchema, response.value) ?? [];
  }

  async function fetchRecord(accession: string): Promise<MetadataRecord> {
    // 1. Study-level metadata (fatal on failure)
    const studyResult = await fetchStudy(accession);
    if (!studyResult.ok) return errorRecord(accession, studyResult.error);
    const study = studyResult.value;

    const record = createRecord(accession);
    record.dateDeposited = study.first_public;
    record.experimentalDetails = buildDetails(study);
    record.species = study.scientific_name;

    // 2. Run-level metadata; the study level rarely carries these fields
    const lookup = await fetchRuns(accession);
    if (lookup.runs.length > 0) {
      const runs = summarizeRuns(lookup.runs);
      if (runs.species) record.species = runs.species;
      record.platform = runs.platform;
      record.dataType = runs.dataType;
      record.tissue = runs.tissue;
      record.age = runs.age;
      record.sequencingType = runs.sequencingType;
    }
    if (lookup.error) {
      logger.warn("ENA run metadata incomplete", { accession, error: lookup.error });
      markPartial(record, lookup.error);
    }

    // 3. Database references
    const refs: string[] = [];
    if (study.study_accession) refs.push(`BioProject:${study.study_accession}`);
    if (study.geo_accession) refs.push(`GEO:${study.geo_accession}`);

    // 4. Cross-references; Europe PMC entries carry the PMID as secondary accession
    const pmids: string[] = [];
    for (const xref of await fetchXrefs(accession)) {
      const primary = xref["Source Primary Accession"];
      const secondary = xref["Source Secondary Accession"];
      if (xref.Source && primary) refs.push(`${xref.Source}:${primary}`);
      if (xref.Source === "EuropePMC" && secondary) pmids.push(secondary);
    }
    record.databaseReferences = refs.join("; ");

    // 5. Publications, falling back to a full-text search by accession and alias
    const unique = uniqueInOrder(pmids);
    const citations =
      unique.length > 0
        ? await deps.citations.resolve(unique)
        : await deps.literature.searchCitations([accession, study.study_alias]);
    record.publishedWorks = citations.join("; ");

    return record;
  }

  return {
    name: "ENA",
    prefixes: () => ["ERP", "SRP", "DRP"],
    async fetch(accession) {
      try {
        return await fetchRecord(accession);
      } catch (err) {
        logger.error("Unexpected error fetching ENA accession", { accession, error: describeError(err) });
        return errorRecord(accession, `Unexpected error: ${describeError(err)}`);
      }
    },
  };
}
