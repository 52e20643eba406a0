/**
 * MetadataRecord construction helpers.
 */

import type { MetadataRecord } from "./types.js";

/** Create an empty record for an accession, ready to be filled in by one adapter. */
export function createRecord(accession: string): MetadataRecord {
  return {
    accession,
    species: "",
    tissue: "",
    age: "",
    sequencingType: "",
    dataType: "",
    platform: "",
    dateDeposited: "",
    experimentalDetails: "",
    publishedWorks: "",
    databaseReferences: "",
    fetchStatus: "success",
    errorMessage: "",
  };
}

/**
 * Create a record in the error state.
 * Built from scratch so that no partially mapped field survives a fatal failure.
 */
export function errorRecord(accession: string, message: string): MetadataRecord {
  return {
    ...createRecord(accession),
    fetchStatus: "error",
    errorMessage: message || "Unknown error",
  };
}

/**
 * Downgrade a record to "partial", appending the reason to its error message.
 * Has no effect on records already in the error state.
 */
export function markPartial(record: MetadataRecord, reason: string): void {
  if (record.fetchStatus === "error") return;
  record.fetchStatus = "partial";
  record.errorMessage = record.errorMessage ? `${record.errorMessage}; ${reason}` : reason;
}
