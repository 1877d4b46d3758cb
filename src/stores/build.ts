import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { writable } from "svelte/store";
import type { DocumentSet, Failure, RenderedPage, SiteConfig, Warning } from "../types";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import { renderIndex, renderPage } from "../lib/renderer";

export interface BuildState {
  pages: RenderedPage[];
  warnings: Warning[];
  failures: Failure[];
  running: boolean;
}

const initialState: BuildState = {
  pages: [],
  warnings: [],
  failures: [],
  running: false,
};

export function createBuildStore(logger: Logger = createLogger("Renderer")) {
  const { subscribe, set, update } = writable<BuildState>(initialState);
  let pages: RenderedPage[] = [];

  return {
    subscribe,

    /**
     * Render every document. One document's failure is recorded and the
     * rest are still rendered.
     */
    run(documents: DocumentSet, config: SiteConfig) {
      set({ ...initialState, running: true });
      const warnings: Warning[] = [];
      const failures: Failure[] = [];
      pages = [];

      const claimed = new Map<string, string>();
      const fail = (id: string, message: string) => {
        logger.error(`${id}: ${message}`);
        failures.push({ id, stage: "render", message });
      };

      for (const document of documents.documents) {
        const owner = claimed.get(document.outputPath);
        if (owner !== undefined) {
          fail(document.id, `Output path ${document.outputPath} is already used by ${owner}`);
          continue;
        }
        claimed.set(document.outputPath, document.id);

        try {
          const result = renderPage(document, {
            documents,
            strictLinks: config.strictLinks,
            extensions: config.extensions,
            siteTitle: config.title,
            lang: config.lang,
            indexFile: config.indexFile,
          });
          pages.push(result.page);
          for (const warning of result.warnings) {
            logger.warn(warning.message);
            warnings.push({ id: document.id, href: warning.href, message: warning.message });
          }
        } catch (e) {
          fail(document.id, errorMessage(e));
        }
      }

      if (config.indexFile !== null) {
        const owner = claimed.get(config.indexFile);
        if (owner !== undefined) {
          fail(config.indexFile, `Output path ${config.indexFile} is already used by ${owner}`);
        } else {
          pages.push(renderIndex(documents, config, config.indexFile));
        }
      }

      logger.debug(`Rendered ${pages.length} page(s)`);
      set({ pages: [...pages], warnings, failures, running: false });
    },

    /** Write rendered pages under `outDir`, recording failed writes */
    async write(outDir: string) {
      update((state) => ({ ...state, running: true }));
      const failures: Failure[] = [];

      for (const page of pages) {
        const target = join(outDir, page.outputPath);
        try {
          await mkdir(dirname(target), { recursive: true });
          await writeFile(target, page.html, "utf8");
          logger.debug(`Wrote ${target}`);
        } catch (e) {
          const message = errorMessage(e);
          logger.error(`${page.outputPath}: ${message}`);
          failures.push({ id: page.id, stage: "write", message });
        }
      }

      update((state) => ({ ...state, failures: [...state.failures, ...failures], running: false }));
    },

    /** Drop all rendered pages */
    reset() {
      pages = [];
      set(initialState);
    },
  };
}

export type BuildStore = ReturnType<typeof createBuildStore>;
