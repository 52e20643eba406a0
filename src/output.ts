/**
 * Report output: records to TSV/CSV rows.
 */

import { writeFile } from "node:fs/promises";
import { stringify } from "csv-stringify/sync";
import { OUTPUT_COLUMNS, type FetchStatus, type MetadataRecord, type OutputColumn } from "./types.js";

export type OutputFormat = "tsv" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["tsv", "csv"];

const DELIMITERS: Record<OutputFormat, string> = {
  tsv: "\t",
  csv: ",",
};

/** Report row keyed by column name; status fields are not reported. */
export function toRow(record: MetadataRecord): Record<OutputColumn, string> {
  return {
    accession: record.accession,
    species: record.species,
    tissue: record.tissue,
    age: record.age,
    sequencing_type: record.sequencingType,
    data_type: record.dataType,
    platform: record.platform,
    date_deposited: record.dateDeposited,
    experimental_details: record.experimentalDetails,
    published_works: record.publishedWorks,
    database_references: record.databaseReferences,
  };
}

/**
 * Render records with a header row.
 * Values containing the delimiter, quotes or newlines are quoted.
 */
export function formatRecords(records: MetadataRecord[], format: OutputFormat = "tsv"): string {
  return stringify(records.map(toRow), {
    header: true,
    columns: [...OUTPUT_COLUMNS],
    delimiter: DELIMITERS[format],
  });
}

export async function writeRecords(
  path: string,
  records: MetadataRecord[],
  format: OutputFormat = "tsv"
): Promise<void> {
  await writeFile(path, formatRecords(records, format), "utf-8");
}

export type StatusCounts = Record<FetchStatus, number>;

export function summarizeStatuses(records: MetadataRecord[]): StatusCounts {
  const counts: StatusCounts = { success: 0, partial: 0, error: 0 };
  for (const record of records) {
    counts[record.fetchStatus]++;
  }
  return counts;
}
