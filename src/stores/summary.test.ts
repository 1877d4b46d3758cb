import { describe, it, expect } from "vitest";
import { get, writable } from "svelte/store";
import type { Failure, RenderedPage } from "../types";
import { loadDocuments } from "../lib/loader";
import type { BuildState } from "./build";
import type { SiteState } from "./site";
import { createSummary, summarize } from "./summary";

const page: RenderedPage = { id: "a.md", outputPath: "a.html", title: "A", html: "<p>A</p>" };
const failure: Failure = { id: "b.md", stage: "load", message: "Malformed document b.md: empty" };

const loadedSite: SiteState = {
  documents: loadDocuments([{ id: "a.md", content: "# A" }]).set,
  failures: [],
  loading: false,
  error: null,
};

const cleanBuild: BuildState = { pages: [page], warnings: [], failures: [], running: false };

describe("summarize", () => {
  it("exits 0 for a clean run", () => {
    expect(summarize(loadedSite, cleanBuild)).toEqual({
      documents: 1,
      pages: 1,
      warnings: 0,
      failures: 0,
      error: null,
      exitCode: 0,
    });
  });

  it("exits 1 when there are only warnings", () => {
    const build = {
      ...cleanBuild,
      warnings: [{ id: "a.md", href: "x.md", message: "Broken link in a.md: x.md" }],
    };
    expect(summarize(loadedSite, build).exitCode).toBe(1);
  });

  it("exits 2 when any document failed", () => {
    const summary = summarize({ ...loadedSite, failures: [failure] }, cleanBuild);

    expect(summary.failures).toBe(1);
    expect(summary.exitCode).toBe(2);
  });

  it("exits 2 when the input could not be read", () => {
    const summary = summarize(
      { documents: null, failures: [], loading: false, error: "Cannot read sources from docs" },
      { pages: [], warnings: [], failures: [], running: false },
    );

    expect(summary.documents).toBe(0);
    expect(summary.error).toBe("Cannot read sources from docs");
    expect(summary.exitCode).toBe(2);
  });
});

describe("createSummary", () => {
  it("follows both stores", () => {
    const site = writable(loadedSite);
    const build = writable(cleanBuild);
    const summary = createSummary(site, build);

    expect(get(summary).exitCode).toBe(0);

    build.set({ ...cleanBuild, failures: [{ ...failure, stage: "render" }] });

    expect(get(summary).exitCode).toBe(2);
  });
});
