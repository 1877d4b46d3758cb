import { writable } from "svelte/store";
import type { DocumentSet, Failure, RawSource } from "../types";
import { errorMessage } from "../lib/errors";
import { loadDocuments, readSources } from "../lib/loader";
import { createLogger } from "../lib/logger";
import type { Logger } from "../lib/logger";

export interface SiteState {
  documents: DocumentSet | null;
  failures: Failure[];
  loading: boolean;
  /** Set when the input as a whole could not be read */
  error: string | null;
}

const initialState: SiteState = {
  documents: null,
  failures: [],
  loading: false,
  error: null,
};

export function createSiteStore(logger: Logger = createLogger("Loader")) {
  const { subscribe, set, update } = writable<SiteState>(initialState);

  function finish(sources: readonly RawSource[], readFailures: Failure[]) {
    const { set: documents, failures } = loadDocuments(sources);
    const allFailures = [...readFailures, ...failures];
    for (const failure of allFailures) {
      logger.error(`${failure.id}: ${failure.message}`);
    }
    logger.debug(`Loaded ${documents.documents.length} document(s)`);

    // Nothing loaded although there was something to load
    const error =
      documents.documents.length === 0 && allFailures.length > 0
        ? "No document could be loaded"
        : null;
    set({ documents, failures: allFailures, loading: false, error });
  }

  return {
    subscribe,

    /** Load in-memory sources in the given order */
    load(sources: readonly RawSource[]) {
      finish(sources, []);
    },

    /** Read and load every source file under a directory */
    async loadDirectory(dir: string, extensions?: readonly string[]) {
      update((state) => ({ ...state, loading: true, error: null }));
      try {
        const { sources, failures } = await readSources(dir, extensions);
        finish(sources, failures);
      } catch (e) {
        const message = errorMessage(e);
        logger.error(message);
        set({ documents: null, failures: [], loading: false, error: message });
      }
    },

    /** Forget everything loaded so far */
    reset() {
      set(initialState);
    },
  };
}

export type SiteStore = ReturnType<typeof createSiteStore>;
