/**
 * Parser for GEO family SOFT files.
 * Extracts per-sample tissue, age and library fields and aggregates them per series.
 *
 * Sample lines look like:
 *   ^SAMPLE = GSM8147269
 *   !Sample_characteristics_ch1 = tissue: left hippocampus
 *   !Sample_source_name_ch1 = left hippocampus
 *   !Sample_molecule_ch1 = nuclear RNA
 *   !Sample_library_source = transcriptomic single cell
 */

import { classifySequencingType, mostCommon, unionSorted } from "../aggregate.js";
import type { SequencingType } from "../types.js";

const TISSUE_KEYS = new Set(["tissue", "tissue type", "organ", "cell type"]);
const AGE_KEYS = new Set(["age", "developmental stage", "dev stage"]);

/** Raw per-line values collected from every sample in a SOFT file */
export interface SoftSampleFields {
  sampleCount: number;
  tissues: string[];
  ages: string[];
  sourceNames: string[];
  librarySources: string[];
  molecules: string[];
}

/** Series-level summary derived from the samples */
export interface SoftSummary {
  sampleCount: number;
  tissue: string;
  age: string;
  sequencingType: SequencingType;
}

/** Right-hand side of a "key = value" line, after the first "=" */
function valueOf(line: string): string {
  const index = line.indexOf("=");
  return index === -1 ? "" : line.slice(index + 1).trim();
}

function collectCharacteristic(value: string, fields: SoftSampleFields): void {
  const colon = value.indexOf(":");
  if (colon === -1) return;
  const key = value.slice(0, colon).trim().toLowerCase();
  const val = value.slice(colon + 1).trim();
  if (!val) return;
  if (TISSUE_KEYS.has(key)) {
    fields.tissues.push(val);
  } else if (AGE_KEYS.has(key)) {
    fields.ages.push(val);
  }
}

/**
 * Collect the raw sample fields from SOFT text.
 */
export function parseSoftSamples(softText: string): SoftSampleFields {
  const fields: SoftSampleFields = {
    sampleCount: 0,
    tissues: [],
    ages: [],
    sourceNames: [],
    librarySources: [],
    molecules: [],
  };

  for (const rawLine of softText.split("\n")) {
    const line = rawLine.trim();

    if (line.startsWith("^SAMPLE")) {
      fields.sampleCount++;
    } else if (line.startsWith("!Sample_characteristics_ch1")) {
      collectCharacteristic(valueOf(line), fields);
    } else if (line.startsWith("!Sample_source_name_ch1")) {
      const value = valueOf(line);
      if (value) fields.sourceNames.push(value);
    } else if (line.startsWith("!Sample_library_source")) {
      const value = valueOf(line).toLowerCase();
      if (value) fields.librarySources.push(value);
    } else if (line.startsWith("!Sample_molecule_ch1")) {
      const value = valueOf(line).toLowerCase();
      if (value) fields.molecules.push(value);
    }
  }

  return fields;
}

/**
 * Aggregate sample fields into one series summary.
 * Tissue prefers characteristics and falls back to sample source names.
 */
export function summarizeSoftSamples(fields: SoftSampleFields): SoftSummary {
  const tissue = fields.tissues.length > 0 ? mostCommon(fields.tissues) : mostCommon(fields.sourceNames);
  return {
    sampleCount: fields.sampleCount,
    tissue,
    age: unionSorted(fields.ages),
    sequencingType: classifySequencingType(fields.librarySources, fields.molecules),
  };
}

export function parseSampleSoft(softText: string): SoftSummary {
  return summarizeSoftSamples(parseSoftSamples(softText));
}
