/**
 * Tests for the command-line entry point.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseAccessionList, runCli, type CliDeps } from "./cli.js";
import type { GrabberOptions, MetadataGrabber } from "./grabber.js";
import { createLogger, type LogLevel } from "./logger.js";
import { formatRecords } from "./output.js";
import { createRecord, errorRecord } from "./record.js";

const fetchAll = vi.fn<MetadataGrabber["fetchAll"]>(async (accessions) =>
  accessions.map((accession) =>
    accession.startsWith("GSE") ? createRecord(accession) : errorRecord(accession, "Unsupported accession prefix")
  )
);
const createGrabber = vi.fn(
  (_options: GrabberOptions): MetadataGrabber => ({ fetchOne: vi.fn<MetadataGrabber["fetchOne"]>(), fetchAll })
);
const makeLogger = vi.fn((_level: LogLevel) => createLogger({ console: false }));

let dir: string;
let stdout: string;
let stderr: string;

function deps(env: NodeJS.ProcessEnv = {}): CliDeps {
  return {
    env,
    createGrabber,
    createLogger: makeLogger,
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
  };
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "accession-metadata-cli-"));
  stdout = "";
  stderr = "";
  fetchAll.mockClear();
  createGrabber.mockClear();
  makeLogger.mockClear();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("parseAccessionList", () => {
  it("skips blank lines and comments", () => {
    expect(parseAccessionList("# batch 1\nGSE1\n\n  ERP2  \r\n#GSE3\n")).toEqual(["GSE1", "ERP2"]);
  });
});

describe("runCli", () => {
  it("fetches the given accessions and writes a TSV report", async () => {
    const output = join(dir, "report.tsv");

    const code = await runCli(["GSE1", "ERP2", "-o", output], deps());

    expect(code).toBe(0);
    expect(fetchAll).toHaveBeenCalledWith(["GSE1", "ERP2"], expect.objectContaining({ concurrency: 1 }));
    expect(stdout).toBe(
      `Fetching metadata for 2 accession(s)...\nDone. 1 succeeded, 0 partial, 1 failed.\nOutput: ${output}\n`
    );
    expect(await readFile(output, "utf-8")).toBe(
      formatRecords([createRecord("GSE1"), errorRecord("ERP2", "Unsupported accession prefix")], "tsv")
    );
  });

  it("reads accessions from a file after the positional ones", async () => {
    const file = join(dir, "accessions.txt");
    await writeFile(file, "# list\nGSE2\n\nGSE3\n", "utf-8");

    const code = await runCli(["GSE1", "-f", file, "-o", join(dir, "out.tsv")], deps());

    expect(code).toBe(0);
    expect(fetchAll.mock.calls[0 as number]?.[0 as number]).toEqual(["GSE1", "GSE2", "GSE3"]);
  });

  it("writes CSV when asked", async () => {
    const output = join(dir, "report.csv");

    await runCli(["GSE1", "--format", "csv", "-o", output], deps());

    expect(await readFile(output, "utf-8")).toBe(formatRecords([createRecord("GSE1")], "csv"));
  });

  it("fails when the accession file is missing", async () => {
    const code = await runCli(["-f", join(dir, "missing.txt")], deps());

    expect(code).toBe(1);
    expect(stderr).toMatch(/^Error: Cannot read accession file /);
    expect(fetchAll).not.toHaveBeenCalled();
  });

  it("exits with a usage error without accessions", async () => {
    const code = await runCli([], deps());

    expect(code).toBe(2);
    expect(stderr).toBe("Error: No accessions given. Pass accessions as arguments or with --file.\n");
  });

  it("rejects an out-of-range concurrency", async () => {
    const code = await runCli(["GSE1", "-c", "0"], deps());

    expect(code).toBe(1);
    expect(stderr).toContain("Must be an integer between 1 and 16.");
    expect(createGrabber).not.toHaveBeenCalled();
  });

  it("passes concurrency from the flag, then the environment", async () => {
    await runCli(["GSE1", "-c", "4", "-o", join(dir, "a.tsv")], deps({ ACCESSION_METADATA_CONCURRENCY: "2" }));
    await runCli(["GSE1", "-o", join(dir, "b.tsv")], deps({ ACCESSION_METADATA_CONCURRENCY: "2" }));

    expect(fetchAll.mock.calls.map((call) => call[1]?.concurrency)).toEqual([4, 2]);
  });

  it("prefers the API key flag over the environment", async () => {
    await runCli(["GSE1", "--ncbi-api-key", "test-secret", "-o", join(dir, "a.tsv")], deps({ NCBI_API_KEY: "env-key" }));
    await runCli(["GSE1", "-o", join(dir, "b.tsv")], deps({ NCBI_API_KEY: "env-key", NCBI_EMAIL: "lab@example.org" }));

    expect(createGrabber.mock.calls[0 as number]?.[0 as number]).toEqual(
      expect.objectContaining({ ncbiApiKey: "test-secret", ncbiTool: "accession-metadata" })
    );
    expect(createGrabber.mock.calls[1 as number]?.[0 as number]).toEqual(
      expect.objectContaining({ ncbiApiKey: "env-key", ncbiEmail: "lab@example.org" })
    );
  });

  it("logs at debug with --verbose and at the configured level otherwise", async () => {
    await runCli(["GSE1", "-v", "-o", join(dir, "a.tsv")], deps());
    await runCli(["GSE1", "-o", join(dir, "b.tsv")], deps({ LOG_LEVEL: "warn" }));
    await runCli(["GSE1", "--log-level", "error", "-o", join(dir, "c.tsv")], deps());

    expect(makeLogger.mock.calls.map(([level]) => level)).toEqual(["debug", "warn", "error"]);
  });

  it("reports invalid environment configuration", async () => {
    const code = await runCli(["GSE1"], deps({ ACCESSION_METADATA_CONCURRENCY: "100" }));

    expect(code).toBe(1);
    expect(stderr).toMatch(/^Error: Invalid configuration: ACCESSION_METADATA_CONCURRENCY: /);
  });
});
