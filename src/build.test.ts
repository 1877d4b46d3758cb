import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildSite, renderSite } from "./build";
import { CONFIG_FILE } from "./config";

describe("renderSite", () => {
  it("renders a dangling link as a warning", () => {
    const outcome = renderSite([{ id: "a.md", content: "[x](missing.md)" }], { logLevel: "silent" });

    expect(outcome.summary).toEqual({
      documents: 1,
      pages: 2,
      warnings: 1,
      failures: 0,
      error: null,
      exitCode: 1,
    });
    expect(outcome.warnings).toEqual([
      { id: "a.md", href: "missing.md", message: "Broken link in a.md: missing.md" },
    ]);
  });

  it("keeps rendering the other documents when one fails to load", () => {
    const outcome = renderSite(
      [
        { id: "a.md", content: "# A" },
        { id: "b.md", content: new Uint8Array([0xc3, 0x28]) },
      ],
      { logLevel: "silent", indexFile: null },
    );

    expect(outcome.pages.map((page) => page.id)).toEqual(["a.md"]);
    expect(outcome.failures.map((failure) => [failure.id, failure.stage])).toEqual([["b.md", "load"]]);
    expect(outcome.summary.exitCode).toBe(2);
  });

  it("reports two sources with the same output path as a failure", () => {
    const outcome = renderSite(
      [
        { id: "a.md", content: "# A" },
        { id: "a.markdown", content: "# A again" },
      ],
      { logLevel: "silent" },
    );

    expect(outcome.pages.map((page) => page.outputPath)).toEqual(["a.html", "contents.html"]);
    expect(outcome.summary.failures).toBe(1);
    expect(outcome.summary.exitCode).toBe(2);
  });

  it("renders nothing when every source fails", () => {
    const outcome = renderSite([{ id: "b.md", content: new Uint8Array([0xff]) }], { logLevel: "silent" });

    expect(outcome.pages).toEqual([]);
    expect(outcome.summary.error).toBe("No document could be loaded");
  });
});

describe("buildSite", () => {
  let dir: string;
  let input: string;
  let out: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "folio-site-"));
    input = join(dir, "docs");
    out = join(dir, "site");
    await mkdir(join(input, "guide"), { recursive: true });
    await writeFile(join(input, "index.md"), "# Home\n\n[Intro](guide/intro.md)");
    await writeFile(join(input, "guide", "intro.md"), "# Intro\n\n[Back](../index.md)");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes every page to the output directory", async () => {
    const outcome = await buildSite({ inputDir: input, config: { outDir: out, logLevel: "silent" } });

    expect(outcome.summary.exitCode).toBe(0);
    expect(outcome.summary.pages).toBe(3);
    const intro = await readFile(join(out, "guide", "intro.html"), "utf8");
    expect(intro).toContain('<a href="../index.html">Back</a>');
    expect(await readFile(join(out, "contents.html"), "utf8")).toContain("<title>Contents - Documentation</title>");
  });

  it("reads settings from the config file", async () => {
    await writeFile(join(input, CONFIG_FILE), JSON.stringify({ title: "Notes" }));

    const outcome = await buildSite({ inputDir: input, config: { outDir: out, logLevel: "silent" } });

    expect(outcome.pages[0].html).toContain("<title>Home - Notes</title>");
  });

  it("reports the extensions configured in the config file", async () => {
    await writeFile(join(input, CONFIG_FILE), JSON.stringify({ extensions: [".txt"] }));
    await writeFile(join(input, "notes.txt"), "# Notes");

    const outcome = await buildSite({ inputDir: input, config: { outDir: out, logLevel: "silent" } });

    expect(outcome.config.extensions).toEqual([".txt"]);
    expect(outcome.pages.map((page) => page.id)).toEqual(["notes.txt", "contents.html"]);
  });

  it("resolves a relative outDir from the config file against the input directory", async () => {
    await writeFile(join(input, CONFIG_FILE), JSON.stringify({ outDir: "../public" }));

    const outcome = await buildSite({ inputDir: input, config: { logLevel: "silent" } });

    expect(outcome.config.outDir).toBe(join(dir, "public"));
    expect(await readFile(join(dir, "public", "index.html"), "utf8")).toContain("<title>Home - Documentation</title>");
  });

  it("writes nothing on a dry run", async () => {
    const outcome = await buildSite({
      inputDir: input,
      config: { outDir: out, logLevel: "silent" },
      dryRun: true,
    });

    expect(outcome.summary.pages).toBe(3);
    await expect(readFile(join(out, "index.html"), "utf8")).rejects.toThrow();
  });

  it("stops when the input directory cannot be read", async () => {
    const outcome = await buildSite({
      inputDir: join(dir, "missing"),
      config: { outDir: out, logLevel: "silent" },
    });

    expect(outcome.summary.error).toMatch(/^Cannot read sources/);
    expect(outcome.summary.exitCode).toBe(2);
    expect(outcome.summary.pages).toBe(0);
  });
});
