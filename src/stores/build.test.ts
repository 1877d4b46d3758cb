import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { get } from "svelte/store";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RawSource } from "../types";
import { resolveConfig } from "../config";
import { loadDocuments } from "../lib/loader";
import { createBuildStore } from "./build";

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function documents(sources: RawSource[]) {
  return loadDocuments(sources).set;
}

describe("build store", () => {
  let build: ReturnType<typeof createBuildStore>;

  beforeEach(() => {
    vi.clearAllMocks();
    build = createBuildStore(logger);
  });

  describe("run", () => {
    it("renders every document plus the contents page", () => {
      build.run(
        documents([
          { id: "index.md", content: "# Home\n[Intro](guide/intro.md)" },
          { id: "guide/intro.md", content: "# Intro" },
        ]),
        resolveConfig(),
      );

      const state = get(build);
      expect(state.pages.map((page) => page.outputPath)).toEqual([
        "index.html",
        "guide/intro.html",
        "contents.html",
      ]);
      expect(state.warnings).toEqual([]);
      expect(state.failures).toEqual([]);
      expect(state.running).toBe(false);
    });

    it("collects broken links as warnings", () => {
      build.run(documents([{ id: "x.md", content: "[x](missing.md)" }]), resolveConfig());

      const state = get(build);
      expect(state.warnings).toEqual([
        { id: "x.md", href: "missing.md", message: "Broken link in x.md: missing.md" },
      ]);
      expect(state.pages).toHaveLength(2);
      expect(logger.warn).toHaveBeenCalledWith("Broken link in x.md: missing.md");
    });

    it("fails only the affected document with strict links", () => {
      build.run(
        documents([
          { id: "x.md", content: "[x](missing.md)" },
          { id: "y.md", content: "# Fine" },
        ]),
        resolveConfig({ strictLinks: true }),
      );

      const state = get(build);
      expect(state.failures).toEqual([
        { id: "x.md", stage: "render", message: "Broken link in x.md: missing.md" },
      ]);
      expect(state.pages.map((page) => page.id)).toEqual(["y.md", "contents.html"]);
    });

    it("skips the contents page when a document already uses its path", () => {
      build.run(documents([{ id: "contents.md", content: "# Mine" }]), resolveConfig());

      const state = get(build);
      expect(state.pages.map((page) => page.id)).toEqual(["contents.md"]);
      expect(state.failures).toEqual([
        {
          id: "contents.html",
          stage: "render",
          message: "Output path contents.html is already used by contents.md",
        },
      ]);
    });

    it("fails a document whose output path is already taken", () => {
      build.run(
        documents([
          { id: "a.md", content: "# From md" },
          { id: "a.markdown", content: "# From markdown" },
        ]),
        resolveConfig({ indexFile: null }),
      );

      const state = get(build);
      expect(state.pages.map((page) => [page.id, page.outputPath])).toEqual([["a.markdown", "a.html"]]);
      expect(state.failures).toEqual([
        { id: "a.md", stage: "render", message: "Output path a.html is already used by a.markdown" },
      ]);
      expect(logger.error).toHaveBeenCalledWith("a.md: Output path a.html is already used by a.markdown");
    });

    it("skips the contents page when disabled", () => {
      build.run(documents([{ id: "a.md", content: "# A" }]), resolveConfig({ indexFile: null }));

      expect(get(build).pages).toHaveLength(1);
    });
  });

  describe("write", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "folio-build-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes pages under the output directory", async () => {
      build.run(documents([{ id: "guide/intro.md", content: "# Intro" }]), resolveConfig());
      const [page] = get(build).pages;

      await build.write(join(dir, "out"));

      expect(await readFile(join(dir, "out", "guide", "intro.html"), "utf8")).toBe(page.html);
      expect(get(build).failures).toEqual([]);
    });

    it("records a failure for each page that cannot be written", async () => {
      await writeFile(join(dir, "blocked"), "not a directory");
      build.run(documents([{ id: "a.md", content: "# A" }]), resolveConfig());

      await build.write(join(dir, "blocked"));

      const state = get(build);
      expect(state.failures.map((failure) => [failure.id, failure.stage])).toEqual([
        ["a.md", "write"],
        ["contents.html", "write"],
      ]);
      expect(state.running).toBe(false);
    });
  });

  describe("reset", () => {
    it("drops rendered pages", () => {
      build.run(documents([{ id: "a.md", content: "# A" }]), resolveConfig());

      build.reset();

      expect(get(build).pages).toEqual([]);
    });
  });
});
