/**
 * Tests for the GEO source adapter.
 */

import { gzipSync } from "node:zlib";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { LiteratureSearch } from "../citations/europepmc.js";
import type { CitationResolver } from "../citations/pubmed.js";
import type { HttpResult, ServiceClient } from "../http/client.js";
import { createLogger } from "../logger.js";
import { accessionToUid, buildSoftUrl, collectGeoReferences, createGeoAdapter } from "./geo.js";

const eutilsGet = vi.fn<ServiceClient["getJson"]>();
const ftpGetBytes = vi.fn<ServiceClient["getBytes"]>();
const resolve = vi.fn<CitationResolver["resolve"]>();
const searchCitations = vi.fn<LiteratureSearch["searchCitations"]>();

function createAdapter() {
  return createGeoAdapter({
    eutils: { name: "NCBI", getJson: eutilsGet, getBytes: vi.fn<ServiceClient["getBytes"]>() },
    ftp: { name: "GEO", getJson: vi.fn<ServiceClient["getJson"]>(), getBytes: ftpGetBytes },
    citations: { resolve },
    literature: { searchCitations },
    logger: createLogger({ console: false }),
  });
}

function ok<T>(value: T): HttpResult<T> {
  return { ok: true, value };
}

const UID = "200000042";

const SERIES = {
  accession: "GSE42",
  title: "Cortical study",
  summary: "Single-nucleus profiling of mouse cortex.",
  taxon: "Mus musculus",
  gdstype: "Expression profiling by high throughput sequencing",
  gpl: "24247",
  pdat: "2020/05/01",
  n_samples: 9,
  pubmedids: ["111"],
  bioproject: "PRJNA1",
  extrelations: [{ relationtype: "SRA", targetobject: "SRP100", targetftplink: "" }],
};

function softText(samples: number): string {
  const lines = ["^SERIES = GSE42"];
  for (let i = 1; i <= samples; i++) {
    lines.push(
      `^SAMPLE = GSM${i}`,
      "!Sample_characteristics_ch1 = tissue: cortex",
      `!Sample_characteristics_ch1 = age: ${i % 2 === 0 ? "P7" : "P14"}`,
      "!Sample_molecule_ch1 = nuclear RNA",
      "!Sample_library_source = transcriptomic single cell"
    );
  }
  return lines.join("\n");
}

function mockEutils(series: Record<string, unknown>, links: string[] = ["111", "222"]) {
  eutilsGet.mockImplementation(async (url) => {
    if (url.endsWith("/esummary.fcgi")) {
      return ok({ result: { uids: [UID], [UID]: series } });
    }
    return ok({
      linksets: [{ dbfrom: "gds", ids: [UID], linksetdbs: [{ dbto: "pubmed", linkname: "gds_pubmed", links }] }],
    });
  });
}

describe("accessionToUid", () => {
  it("offsets the series number", () => {
    expect(accessionToUid("GSE149739")).toBe(200149739);
    expect(accessionToUid("GSE1")).toBe(200000001);
    expect(accessionToUid("gse42")).toBe(200000042);
  });

  it("rejects other prefixes", () => {
    expect(() => accessionToUid("ERP1")).toThrow("Invalid GSE accession: ERP1");
    expect(() => accessionToUid("GSE")).toThrow("Invalid GSE accession: GSE");
  });
});

describe("buildSoftUrl", () => {
  it("replaces the last three digits of the directory stem with nnn", () => {
    expect(buildSoftUrl("GSE261596")).toBe(
      "https://ftp.ncbi.nlm.nih.gov/geo/series/GSE261nnn/GSE261596/soft/GSE261596_family.soft.gz"
    );
    expect(buildSoftUrl("GSE100")).toBe(
      "https://ftp.ncbi.nlm.nih.gov/geo/series/GSEnnn/GSE100/soft/GSE100_family.soft.gz"
    );
    expect(buildSoftUrl("gse1234")).toBe(
      "https://ftp.ncbi.nlm.nih.gov/geo/series/GSE1nnn/GSE1234/soft/GSE1234_family.soft.gz"
    );
  });
});

describe("collectGeoReferences", () => {
  it("lists BioProject, external relations and platform in order", () => {
    const refs = collectGeoReferences({
      bioproject: "PRJNA1",
      extrelations: [{ relationtype: "SRA", targetobject: "SRP100" }, { relationtype: "BioSample" }],
      gpl: "24247",
    });
    expect(refs).toEqual(["BioProject:PRJNA1", "SRA:SRP100", "GEO_Platform:GPL24247"]);
  });
});

describe("createGeoAdapter", () => {
  beforeEach(() => {
    eutilsGet.mockReset();
    ftpGetBytes.mockReset();
    resolve.mockReset();
    searchCitations.mockReset();
  });

  it("builds a full record from summary, SOFT file and citations", async () => {
    mockEutils(SERIES);
    ftpGetBytes.mockResolvedValueOnce(ok(gzipSync(softText(9))));
    resolve.mockResolvedValueOnce(["Citation A", "Citation B"]);

    const record = await createAdapter().fetch("GSE42");

    expect(record).toEqual({
      accession: "GSE42",
      species: "Mus musculus",
      tissue: "cortex",
      age: "P14; P7",
      sequencingType: "single nuclei",
      dataType: "Expression profiling by high throughput sequencing",
      platform: "GPL24247",
      dateDeposited: "2020-05-01",
      experimentalDetails: "Cortical study. Single-nucleus profiling of mouse cortex. (n=9 samples)",
      publishedWorks: "Citation A; Citation B",
      databaseReferences: "BioProject:PRJNA1; SRA:SRP100; GEO_Platform:GPL24247",
      fetchStatus: "success",
      errorMessage: "",
    });
    expect(record.experimentalDetails).toContain("Cortical study");
    expect(record.databaseReferences).toContain("BioProject:PRJNA1");
    expect(resolve).toHaveBeenCalledWith(["111", "222"]);
    expect(ftpGetBytes).toHaveBeenCalledWith(
      "https://ftp.ncbi.nlm.nih.gov/geo/series/GSEnnn/GSE42/soft/GSE42_family.soft.gz",
      undefined,
      { timeoutMs: 90_000 }
    );
    expect(eutilsGet).toHaveBeenCalledWith("https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi", {
      db: "gds",
      id: UID,
      retmode: "json",
      version: "2.0",
    });
  });

  it("uses the SOFT sample count when the summary has none", async () => {
    const { n_samples: _omitted, ...withoutCount } = SERIES;
    mockEutils(withoutCount);
    ftpGetBytes.mockResolvedValueOnce(ok(Buffer.from(softText(4), "utf-8")));
    resolve.mockResolvedValueOnce([]);

    const record = await createAdapter().fetch("GSE42");

    expect(record.experimentalDetails).toBe("Cortical study. Single-nucleus profiling of mouse cortex. (n=4 samples)");
    expect(record.fetchStatus).toBe("success");
  });

  it("marks the record partial when the SOFT download fails", async () => {
    mockEutils(SERIES);
    ftpGetBytes.mockResolvedValueOnce({ ok: false, error: "HTTP 404 Not Found" });
    resolve.mockResolvedValueOnce(["Citation A"]);

    const record = await createAdapter().fetch("GSE42");

    expect(record.fetchStatus).toBe("partial");
    expect(record.errorMessage).toBe("SOFT download failed: HTTP 404 Not Found");
    expect(record.tissue).toBe("");
    expect(record.species).toBe("Mus musculus");
    expect(record.experimentalDetails).toContain("(n=9 samples)");
    expect(record.publishedWorks).toBe("Citation A");
  });

  it("marks the record partial when the SOFT file cannot be decompressed", async () => {
    mockEutils(SERIES);
    ftpGetBytes.mockResolvedValueOnce(ok(Buffer.from([0x1f, 0x8b, 0x00, 0x00])));
    resolve.mockResolvedValueOnce([]);

    const record = await createAdapter().fetch("GSE42");

    expect(record.fetchStatus).toBe("partial");
    expect(record.errorMessage).toMatch(/^Failed to decompress SOFT file: /);
  });

  it("falls back to a literature search by accession without linked PubMed IDs", async () => {
    const { pubmedids: _omitted, ...withoutPmids } = SERIES;
    mockEutils(withoutPmids, []);
    ftpGetBytes.mockResolvedValueOnce(ok(gzipSync(softText(1))));
    searchCitations.mockResolvedValueOnce(["Found by search"]);

    const record = await createAdapter().fetch("GSE42");

    expect(resolve).not.toHaveBeenCalled();
    expect(searchCitations).toHaveBeenCalledWith(["GSE42"]);
    expect(record.publishedWorks).toBe("Found by search");
  });

  it("returns an error record when eSummary fails", async () => {
    eutilsGet.mockResolvedValueOnce({ ok: false, error: "HTTP 500 Internal Server Error" });

    const record = await createAdapter().fetch("GSE42");

    expect(record.fetchStatus).toBe("error");
    expect(record.errorMessage).toBe("eSummary request failed: HTTP 500 Internal Server Error");
    expect(record.species).toBe("");
    expect(ftpGetBytes).not.toHaveBeenCalled();
  });

  it("returns an error record when eSummary has no document", async () => {
    mockEutils({ uid: UID, error: "cannot get document summary" });

    const record = await createAdapter().fetch("GSE42");

    expect(record.fetchStatus).toBe("error");
    expect(record.errorMessage).toBe("eSummary returned no data");
  });

  it("captures an invalid accession in the record without network calls", async () => {
    const record = await createAdapter().fetch("ERP123");

    expect(record.fetchStatus).toBe("error");
    expect(record.errorMessage).toBe("Invalid GSE accession: ERP123");
    expect(eutilsGet).not.toHaveBeenCalled();
  });
});
