/**
 * Tests for the merge command, run in-process
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { exitCodeFor, runMerge } from "../src/cli/commands/merge.js";
import { EXIT_CODES } from "../src/cli/exit-codes.js";
import { setJsonMode } from "../src/cli/output.js";
import { ConfigError, DuplicateKeyError, FileNotFoundError, LoadError, SectionTypeError } from "../src/errors.js";
import { TemplateLoader } from "../src/parser/loader.js";
import { TaggedNode } from "../src/parser/tagged.js";
import { cleanupTempDir, createTempDir, writeFixture } from "./helpers/fs.js";

const BASE = [
  "AWSTemplateFormatVersion: '2010-09-09'",
  "Description: Base stack",
  "Resources:",
  "  A:",
  "    Type: X",
  "",
].join("\n");

describe("runMerge", () => {
  let tempDir: string;
  let logSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(async () => {
    tempDir = await createTempDir();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    setJsonMode(false);
    vi.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  async function readOut(out: string) {
    return new TemplateLoader().load(await fs.readFile(out, "utf-8"), out);
  }

  it("should merge fragments and write the result", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources:\n  Bk:\n    Type: Y\n");
    const f2 = await writeFixture(tempDir, "f2.yaml", "Outputs:\n  O1:\n    Value: !Ref Bk\n");
    const out = path.join(tempDir, "out.yaml");

    const code = await runMerge({ base, fragments: [f1, f2], out });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const merged = await readOut(out);
    expect([...merged.keys()]).toEqual([
      "AWSTemplateFormatVersion",
      "Description",
      "Resources",
      "Outputs",
    ]);
    expect(merged.get("Resources")).toEqual(
      new Map([
        ["A", new Map([["Type", "X"]])],
        ["Bk", new Map([["Type", "Y"]])],
      ]),
    );
    expect(merged.get("Outputs")).toEqual(
      new Map([["O1", new Map([["Value", new TaggedNode("!Ref", "Bk")]])]]),
    );
    expect(logSpy).toHaveBeenCalledWith(expect.anything(), `Merged 2 fragment(s) into ${out}`);
  });

  it("should print a JSON result in JSON mode", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources:\n  Bk:\n    Type: Y\n");
    const out = path.join(tempDir, "out.yaml");
    setJsonMode(true);

    const code = await runMerge({ base, fragments: [f1], out });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      success: true,
      out,
      fragments: 1,
      sections: [{ section: "Resources", fromBase: 1, fromFragments: 1, total: 2 }],
    });
  });

  it("should read inputs from a config file", async () => {
    await writeFixture(tempDir, "base.yaml", BASE);
    await writeFixture(tempDir, "f1.yaml", "Resources:\n  Bk:\n    Type: Y\n");
    const config = await writeFixture(
      tempDir,
      "merge.yaml",
      "base: base.yaml\nfragments: [f1.yaml]\nout: out.yaml\nformat:\n  indent: 4\n",
    );

    const code = await runMerge({ config });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const text = await fs.readFile(path.join(tempDir, "out.yaml"), "utf-8");
    expect(text).toContain("\n    A:\n        Type: X\n");
  });

  it("should fail with CONFLICT on a duplicate item and write nothing", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources:\n  A:\n    Type: Other\n");
    const out = path.join(tempDir, "out.yaml");

    const code = await runMerge({ base, fragments: [f1], out });

    expect(code).toBe(EXIT_CODES.CONFLICT);
    expect(errorSpy).toHaveBeenCalledWith(expect.anything(), `Duplicate Resources key A in ${f1}`);
    await expect(fs.access(out)).rejects.toThrow();
  });

  it("should leave an existing output file untouched on failure", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources:\n  A:\n    Type: Other\n");
    const out = await writeFixture(tempDir, "out.yaml", "previous: run\n");

    await runMerge({ base, fragments: [f1], out });

    expect(await fs.readFile(out, "utf-8")).toBe("previous: run\n");
  });

  it("should fail with VALIDATION_FAILED when a section is not a mapping", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Parameters: not-a-mapping\n");
    const out = path.join(tempDir, "out.yaml");

    const code = await runMerge({ base, fragments: [f1], out });

    expect(code).toBe(EXIT_CODES.VALIDATION_FAILED);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.anything(),
      `${f1} section Parameters must be a mapping`,
    );
  });

  it("should fail with VALIDATION_FAILED when a template is not a mapping", async () => {
    const base = await writeFixture(tempDir, "base.yaml", "- just\n- a list\n");
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources: {}\n");
    const out = path.join(tempDir, "out.yaml");

    const code = await runMerge({ base, fragments: [f1], out });

    expect(code).toBe(EXIT_CODES.VALIDATION_FAILED);
    expect(errorSpy).toHaveBeenCalledWith(expect.anything(), `${base} must contain a YAML mapping`);
  });

  it("should fail with NOT_FOUND for a missing fragment", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const missing = path.join(tempDir, "missing.yaml");
    const out = path.join(tempDir, "out.yaml");

    const code = await runMerge({ base, fragments: [missing], out });

    expect(code).toBe(EXIT_CODES.NOT_FOUND);
    expect(errorSpy).toHaveBeenCalledWith(expect.anything(), `File not found: ${missing}`);
  });

  it("should fail with NOT_FOUND for a missing config file", async () => {
    const config = path.join(tempDir, "missing-merge.yaml");

    const code = await runMerge({ config });

    expect(code).toBe(EXIT_CODES.NOT_FOUND);
    expect(errorSpy).toHaveBeenCalledWith(expect.anything(), `File not found: ${config}`);
  });

  it("should fail with USAGE_ERROR when no output is given", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources: {}\n");

    const code = await runMerge({ base, fragments: [f1] });

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.anything(),
      'No output path given. Use --out or set "out" in the config file.',
    );
  });

  it("should fail with ERROR when the output cannot be written", async () => {
    const base = await writeFixture(tempDir, "base.yaml", BASE);
    const f1 = await writeFixture(tempDir, "f1.yaml", "Resources: {}\n");
    const out = path.join(tempDir, "taken");
    await fs.mkdir(out);

    const code = await runMerge({ base, fragments: [f1], out });

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(errorSpy).toHaveBeenCalledWith(expect.anything(), `Failed to write ${out}`);
  });
});

describe("exitCodeFor", () => {
  it("should map each failure to its exit code", () => {
    expect(exitCodeFor(new DuplicateKeyError("Resources", "A", "f.yaml"))).toBe(EXIT_CODES.CONFLICT);
    expect(exitCodeFor(new SectionTypeError("f.yaml", "Outputs"))).toBe(EXIT_CODES.VALIDATION_FAILED);
    expect(exitCodeFor(new LoadError("f.yaml"))).toBe(EXIT_CODES.VALIDATION_FAILED);
    expect(exitCodeFor(new ConfigError("bad"))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new FileNotFoundError("f.yaml"))).toBe(EXIT_CODES.NOT_FOUND);
    expect(exitCodeFor(new Error("boom"))).toBe(EXIT_CODES.ERROR);
  });
});
