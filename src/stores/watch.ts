import { watch } from "node:fs";
import type { FSWatcher } from "node:fs";
import { writable } from "svelte/store";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { Logger } from "../lib/logger";

interface WatchState {
  watching: boolean;
  lastChange: string | null;
  rebuilds: number;
  error: string | null;
}

export interface Watcher {
  close(): void;
}

/**
 * Subscribe to changes under `dir`; `onChange` gets the changed path and
 * `onError` anything that ends the subscription.
 */
export type WatchFn = (
  dir: string,
  onChange: (file: string) => void,
  onError: (error: Error) => void,
) => Watcher;

export function watchDirectory(
  dir: string,
  onChange: (file: string) => void,
  onError: (error: Error) => void,
): FSWatcher {
  const watcher = watch(dir, { recursive: true }, (_event, filename) => {
    onChange(filename ? String(filename) : dir);
  });
  watcher.on("error", onError);
  return watcher;
}

export interface WatchOptions {
  dir: string;
  rebuild: () => Promise<unknown>;
  /** Changed files that should trigger a rebuild */
  filter?: (file: string) => boolean;
  watch?: WatchFn;
  /** Quiet period before rebuilding, in ms */
  delay?: number;
  logger?: Logger;
}

export function createWatchStore(options: WatchOptions) {
  const { dir, rebuild, filter = () => true, delay = 100 } = options;
  const watchFn = options.watch ?? watchDirectory;
  const logger = options.logger ?? createLogger("Watch");

  const { subscribe, update } = writable<WatchState>({
    watching: false,
    lastChange: null,
    rebuilds: 0,
    error: null,
  });

  let watcher: Watcher | null = null;
  let rebuildTimer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;
  let rerun = false;

  async function runRebuilds() {
    do {
      rerun = false;
      try {
        await rebuild();
        update((state) => ({ ...state, rebuilds: state.rebuilds + 1, error: null }));
      } catch (e) {
        const message = errorMessage(e);
        logger.error(`Rebuild failed: ${message}`);
        update((state) => ({ ...state, error: message }));
      }
    } while (rerun);
  }

  /** Rebuild now; a change arriving mid-rebuild queues one more pass */
  function flush(): Promise<void> {
    if (inFlight) {
      rerun = true;
      return inFlight;
    }
    inFlight = runRebuilds().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  function handleChange(file: string) {
    if (!filter(file)) return;
    update((state) => ({ ...state, lastChange: file }));
    logger.info(`File changed: ${file}`);

    if (rebuildTimer) {
      clearTimeout(rebuildTimer);
    }
    rebuildTimer = setTimeout(() => {
      rebuildTimer = null;
      flush().catch((e: unknown) => logger.error(errorMessage(e)));
    }, delay);
  }

  function closeWatcher() {
    if (rebuildTimer) {
      clearTimeout(rebuildTimer);
      rebuildTimer = null;
    }
    if (watcher) {
      watcher.close();
      watcher = null;
    }
  }

  function handleError(error: Error) {
    logger.error(`Watching ${dir} failed: ${error.message}`);
    closeWatcher();
    update((state) => ({ ...state, watching: false, error: error.message }));
  }

  return {
    subscribe,

    /** Start watching; a second call while watching does nothing */
    start() {
      if (watcher) return;
      try {
        watcher = watchFn(dir, handleChange, handleError);
        update((state) => ({ ...state, watching: true, error: null }));
        logger.info(`Watching ${dir}`);
      } catch (e) {
        const message = errorMessage(e);
        logger.error(`Cannot watch ${dir}: ${message}`);
        update((state) => ({ ...state, error: message }));
      }
    },

    /** Stop watching and cancel any pending rebuild */
    stop() {
      closeWatcher();
      update((state) => ({ ...state, watching: false }));
    },

    /** Settles once the current rebuild, if any, is done */
    settled(): Promise<void> {
      return inFlight ?? Promise.resolve();
    },
  };
}

export type WatchStore = ReturnType<typeof createWatchStore>;
