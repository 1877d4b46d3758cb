import { resolve } from "node:path";
import { get } from "svelte/store";
import type { BuildSummary, Failure, RawSource, RenderedPage, SiteConfig, Warning } from "./types";
import { loadConfigFile, resolveConfig } from "./config";
import { createLogger } from "./lib/logger";
import { createBuildStore } from "./stores/build";
import { createSiteStore } from "./stores/site";
import { createSummary } from "./stores/summary";

export interface BuildOutcome {
  /** Settings the run used, after merging every layer */
  config: SiteConfig;
  summary: BuildSummary;
  pages: RenderedPage[];
  warnings: Warning[];
  failures: Failure[];
}

export interface BuildOptions {
  inputDir: string;
  /** Settings that override the defaults and folio.config.json */
  config?: Partial<SiteConfig>;
  /** Skip writing pages to disk */
  dryRun?: boolean;
}

function createRun(config: SiteConfig) {
  const site = createSiteStore(createLogger("Loader", config.logLevel));
  const build = createBuildStore(createLogger("Renderer", config.logLevel));
  const summary = createSummary(site, build);
  return { site, build, summary };
}

function report(run: ReturnType<typeof createRun>, config: SiteConfig): BuildOutcome {
  const summary = get(run.summary);
  const { pages, warnings, failures } = get(run.build);
  const logger = createLogger("Build", config.logLevel);
  if (summary.error !== null) {
    logger.error(`Build stopped: ${summary.error}`);
  }
  logger.info(
    `${summary.pages} page(s) from ${summary.documents} document(s), ` +
      `${summary.warnings} warning(s), ${summary.failures} failure(s)`,
  );
  return {
    config,
    summary,
    pages,
    warnings,
    failures: [...get(run.site).failures, ...failures],
  };
}

/** Load and render in-memory sources without touching the file system */
export function renderSite(sources: readonly RawSource[], config: Partial<SiteConfig> = {}): BuildOutcome {
  const resolved = resolveConfig(config);
  const run = createRun(resolved);

  run.site.load(sources);
  const { documents, error } = get(run.site);
  if (documents && error === null) {
    run.build.run(documents, resolved);
  }
  return report(run, resolved);
}

/** Read sources from a directory, render them and write the pages */
export async function buildSite(options: BuildOptions): Promise<BuildOutcome> {
  const fileConfig = await loadConfigFile(options.inputDir);
  if (fileConfig.outDir !== undefined) {
    fileConfig.outDir = resolve(options.inputDir, fileConfig.outDir);
  }
  const config = resolveConfig(fileConfig, options.config ?? {});
  const run = createRun(config);

  await run.site.loadDirectory(options.inputDir, config.extensions);
  const { documents, error } = get(run.site);
  if (documents && error === null) {
    run.build.run(documents, config);
    if (!options.dryRun) {
      await run.build.write(resolve(config.outDir));
    }
  }
  return report(run, config);
}
