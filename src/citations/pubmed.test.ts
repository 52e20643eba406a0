/**
 * Tests for the PubMed citation resolver.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import type { HttpResult, ServiceClient } from "../http/client.js";
import { createLogger } from "../logger.js";
import { createCitationResolver, ESUMMARY_URL, formatPubMedCitation, joinCitation } from "./pubmed.js";

const getJson = vi.fn<ServiceClient["getJson"]>();
const client: ServiceClient = {
  name: "NCBI",
  getJson,
  getBytes: vi.fn<ServiceClient["getBytes"]>(),
};
const logger = createLogger({ console: false });

function ok(value: unknown): HttpResult<unknown> {
  return { ok: true, value };
}

const SMITH_2021 = {
  uid: "111",
  authors: [{ name: "Smith J" }, { name: "Doe A" }],
  pubdate: "2021 Mar 4",
  title: "A cortical cell atlas.",
  source: "Nature",
  articleids: [
    { idtype: "pubmed", value: "111" },
    { idtype: "doi", value: "10.1000/atlas" },
  ],
};

describe("joinCitation", () => {
  it("skips empty parts", () => {
    expect(joinCitation({ author: "Lee K", year: "2020", title: "", journal: "", pmid: "5" })).toBe(
      "Lee K (2020). PMID:5"
    );
  });
});

describe("formatPubMedCitation", () => {
  it("formats first author et al., year, title, journal and DOI", () => {
    expect(formatPubMedCitation(SMITH_2021)).toBe(
      "Smith J et al. (2021). A cortical cell atlas. Nature. DOI:10.1000/atlas"
    );
  });

  it("uses the PMID when there is no DOI", () => {
    expect(
      formatPubMedCitation({
        ...SMITH_2021,
        authors: [{ name: "Smith J" }],
        articleids: [{ idtype: "pubmed", value: "111" }],
      })
    ).toBe("Smith J (2021). A cortical cell atlas. Nature. PMID:111");
  });

  it("uses Unknown when there are no authors", () => {
    expect(formatPubMedCitation({ ...SMITH_2021, authors: [] })).toBe(
      "Unknown (2021). A cortical cell atlas. Nature. DOI:10.1000/atlas"
    );
  });
});

describe("createCitationResolver", () => {
  beforeEach(() => {
    getJson.mockReset();
  });

  it("returns an empty list without a request for no IDs", async () => {
    const resolver = createCitationResolver(client, { logger });

    expect(await resolver.resolve([])).toEqual([]);
    expect(getJson).not.toHaveBeenCalled();
  });

  it("collapses duplicate IDs into one citation", async () => {
    getJson.mockResolvedValueOnce(ok({ result: { uids: ["111"], "111": SMITH_2021 } }));
    const resolver = createCitationResolver(client, { logger });

    const citations = await resolver.resolve(["111", "111"]);

    expect(citations).toEqual(["Smith J et al. (2021). A cortical cell atlas. Nature. DOI:10.1000/atlas"]);
    expect(getJson).toHaveBeenCalledWith(ESUMMARY_URL, {
      db: "pubmed",
      id: "111",
      retmode: "json",
      version: "2.0",
    });
  });

  it("falls back to PMID:<id> for IDs PubMed cannot summarize", async () => {
    getJson.mockResolvedValueOnce(
      ok({ result: { uids: ["111"], "111": SMITH_2021, "999": { uid: "999", error: "cannot get document summary" } } })
    );
    const resolver = createCitationResolver(client, { logger });

    const citations = await resolver.resolve(["999", "111"]);

    expect(citations).toEqual([
      "PMID:999",
      "Smith J et al. (2021). A cortical cell atlas. Nature. DOI:10.1000/atlas",
    ]);
  });

  it("falls back for every ID in a failed request", async () => {
    getJson.mockResolvedValueOnce({ ok: false, error: "HTTP 500 Internal Server Error" });
    const resolver = createCitationResolver(client, { logger });

    expect(await resolver.resolve(["1", "2"])).toEqual(["PMID:1", "PMID:2"]);
  });

  it("splits large ID lists into batches", async () => {
    getJson.mockResolvedValue(ok({ result: {} }));
    const resolver = createCitationResolver(client, { logger, batchSize: 2 });

    const citations = await resolver.resolve(["1", "2", "3"]);

    expect(citations).toEqual(["PMID:1", "PMID:2", "PMID:3"]);
    expect(getJson).toHaveBeenCalledTimes(2);
    expect(getJson.mock.calls[1 as number]?.[1 as number]).toEqual(expect.objectContaining({ id: "3" }));
  });
});
