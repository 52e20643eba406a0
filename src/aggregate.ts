/**
 * Pure reducers for merging per-sample and per-run values into one field.
 */

import type { SequencingType } from "./types.js";

const JOINER = "; ";

function nonEmpty(values: Iterable<string>): string[] {
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}

/**
 * All distinct non-empty values, sorted and "; "-joined.
 * Used for age-like fields where several values are all meaningful.
 */
export function unionSorted(values: Iterable<string>): string {
  return [...new Set(nonEmpty(values))].sort().join(JOINER);
}

/**
 * The most frequent non-empty value.
 * When several values share the highest count the result is every distinct
 * value, sorted and "; "-joined, so that heterogeneous inputs are visible
 * instead of one being picked arbitrarily.
 */
export function mostCommon(values: Iterable<string>): string {
  const counts = new Map<string, number>();
  for (const value of nonEmpty(values)) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  if (counts.size === 0) return "";

  const highest = Math.max(...counts.values());
  const leaders = [...counts].filter(([, count]) => count === highest);
  if (leaders.length === 1) return leaders[0]?.[0] ?? "";

  return [...counts.keys()].sort().join(JOINER);
}

/** Library-source phrases that indicate a single-cell assay */
const SINGLE_CELL_KEYWORDS = ["transcriptomic single cell", "single cell"];
/** Molecule phrases that refine single cell to single nuclei */
const NUCLEAR_RNA_KEYWORDS = ["nuclear rna"];
/** Library-source phrases that indicate a bulk assay */
const BULK_KEYWORDS = ["transcriptomic", "genomic"];

function anyContains(values: Set<string>, keywords: string[]): boolean {
  for (const value of values) {
    if (keywords.some((keyword) => value.includes(keyword))) return true;
  }
  return false;
}

function toLowerSet(values: Iterable<string>): Set<string> {
  return new Set(nonEmpty(values).map((value) => value.toLowerCase()));
}

/**
 * Classify the assay from library-source and molecule values.
 *
 * @param librarySources - free-text library source / strategy values
 * @param molecules - free-text molecule values (may be empty)
 */
export function classifySequencingType(
  librarySources: Iterable<string>,
  molecules: Iterable<string>
): SequencingType {
  const sources = toLowerSet(librarySources);
  if (sources.size === 0) return "";

  if (anyContains(sources, SINGLE_CELL_KEYWORDS)) {
    return anyContains(toLowerSet(molecules), NUCLEAR_RNA_KEYWORDS) ? "single nuclei" : "single cell";
  }
  if (anyContains(sources, BULK_KEYWORDS)) return "bulk";
  return "other";
}

/** Deduplicate preserving first-seen order, dropping empty strings. */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(nonEmpty(values))];
}
