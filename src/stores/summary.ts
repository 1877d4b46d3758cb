import { derived } from "svelte/store";
import type { Readable } from "svelte/store";
import type { BuildSummary } from "../types";
import type { BuildState } from "./build";
import type { SiteState } from "./site";

/** Counts and exit code of the current run */
export function summarize(site: SiteState, build: BuildState): BuildSummary {
  const failures = site.failures.length + build.failures.length;
  const warnings = build.warnings.length;
  const exitCode = site.error !== null || failures > 0 ? 2 : warnings > 0 ? 1 : 0;

  return {
    documents: site.documents?.documents.length ?? 0,
    pages: build.pages.length,
    warnings,
    failures,
    error: site.error,
    exitCode,
  };
}

export function createSummary(
  site: Readable<SiteState>,
  build: Readable<BuildState>,
): Readable<BuildSummary> {
  return derived([site, build], ([$site, $build]) => summarize($site, $build));
}
