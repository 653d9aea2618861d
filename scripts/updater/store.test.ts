import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { PersistenceError } from "../shared/errors";
import { mergeDocuments, prepareDataDir, readDocument, serializeDocument, writeDocument } from "./store";
import type { ProjectDocument } from "./types";

const DOCUMENT: ProjectDocument = {
  project: "github.com/owner/project",
  commit: "abc123",
  date: "2024-01-01T10:00:00+00:00",
  metrics: { python_lines: 100, license: "MIT", "file:setup.py": 1 },
};

describe("serializeDocument", () => {
  it("writes fields in a fixed order with sorted metrics", () => {
    expect(serializeDocument(DOCUMENT)).toBe(
      [
        "{",
        '  "project": "github.com/owner/project",',
        '  "commit": "abc123",',
        '  "date": "2024-01-01T10:00:00+00:00",',
        '  "metrics": {',
        '    "file:setup.py": 1,',
        '    "license": "MIT",',
        '    "python_lines": 100',
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });
});

describe("mergeDocuments", () => {
  it("keeps metrics the new document does not carry", () => {
    const next: ProjectDocument = { ...DOCUMENT, commit: "def456", metrics: { license: "Apache-2.0" } };
    expect(mergeDocuments(DOCUMENT, next)).toEqual({
      ...next,
      metrics: { "file:setup.py": 1, license: "Apache-2.0", python_lines: 100 },
    });
  });

  it("replaces documents of another project", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const next: ProjectDocument = { ...DOCUMENT, project: "github.com/owner/other", metrics: {} };
    expect(mergeDocuments(DOCUMENT, next)).toEqual(next);
    vi.restoreAllMocks();
  });
});

describe("document files", () => {
  let dataDir: string;
  let filePath: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "pystyle-store-"));
    filePath = path.join(dataDir, "github.com", "owner", "project.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dataDir);
  });

  it("writes byte-identical content on repeated runs", async () => {
    await expect(writeDocument(filePath, DOCUMENT)).resolves.toBe("written");
    const first = await fs.readFile(filePath, "utf8");

    await expect(writeDocument(filePath, { ...DOCUMENT, metrics: { ...DOCUMENT.metrics } })).resolves.toBe(
      "unchanged"
    );
    expect(await fs.readFile(filePath, "utf8")).toBe(first);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["project.json"]);
  });

  it("reads documents back", async () => {
    await writeDocument(filePath, DOCUMENT);
    await expect(readDocument(filePath)).resolves.toEqual(DOCUMENT);
    await expect(readDocument(path.join(dataDir, "missing.json"))).resolves.toBeNull();
  });

  it("ignores malformed documents", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await fs.outputFile(filePath, "{ not json");
    await expect(readDocument(filePath)).resolves.toBeNull();
    await fs.outputJson(filePath, { metrics: {} });
    await expect(readDocument(filePath)).resolves.toBeNull();
  });

  it("reports write failures as persistence errors", async () => {
    await fs.outputFile(path.join(dataDir, "github.com"), "a file where a directory belongs");
    await expect(writeDocument(filePath, DOCUMENT)).rejects.toBeInstanceOf(PersistenceError);
  });

  it("refuses a data directory that cannot be created", async () => {
    const blocker = path.join(dataDir, "blocker");
    await fs.outputFile(blocker, "");
    await expect(prepareDataDir(path.join(blocker, "data"))).rejects.toThrow(
      `Data directory ${path.join(blocker, "data")} is not writable`
    );
  });
});
