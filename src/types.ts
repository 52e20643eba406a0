/**
 * Accession metadata type definitions.
 * Defines the normalized record shared by every source adapter and the output layer.
 */

/**
 * Outcome of fetching one accession.
 * - "success": every call needed for the record completed
 * - "partial": a non-fatal call failed; the record is usable but incomplete
 * - "error": the primary lookup failed; only `accession` and `errorMessage` are set
 */
export type FetchStatus = "success" | "partial" | "error";

/**
 * Controlled assay category.
 * An empty string means no library-source signal was available at all,
 * while "other" means a signal was present but matched no category.
 */
export type SequencingType = "bulk" | "single cell" | "single nuclei" | "other" | "";

/**
 * Normalized metadata for a single dataset accession.
 */
export interface MetadataRecord {
  /** Accession as supplied by the caller (trimmed) */
  readonly accession: string;
  /** Scientific name of the organism */
  species: string;
  tissue: string;
  /** All distinct sample ages, sorted and "; "-joined */
  age: string;
  sequencingType: SequencingType;
  /** Archive-specific data type (GEO series type or ENA library strategy) */
  dataType: string;
  platform: string;
  /** Public release date, YYYY-MM-DD */
  dateDeposited: string;
  /** Title, summary and sample counts concatenated */
  experimentalDetails: string;
  /** Citation strings, "; "-joined */
  publishedWorks: string;
  /** "Source:ID" pairs, "; "-joined, in discovery order */
  databaseReferences: string;
  fetchStatus: FetchStatus;
  errorMessage: string;
}

/** Report column names, in output order. Status fields are not part of the report. */
export const OUTPUT_COLUMNS = [
  "accession",
  "species",
  "tissue",
  "age",
  "sequencing_type",
  "data_type",
  "platform",
  "date_deposited",
  "experimental_details",
  "published_works",
  "database_references",
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

/**
 * A fetch-and-normalize implementation for one archive.
 */
export interface SourceAdapter {
  /** Human-readable adapter name, used in logs */
  readonly name: string;
  /** Upper-case accession prefixes routed to this adapter (e.g. "GSE") */
  prefixes(): string[];
  /** Fetch one accession. Never rejects: failures are reported on the record. */
  fetch(accession: string): Promise<MetadataRecord>;
}
