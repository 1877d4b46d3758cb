import { basename } from "node:path";
import { parseArgs } from "node:util";
import type { SiteConfig } from "./types";
import { buildSite } from "./build";
import { CONFIG_FILE, DEFAULT_CONFIG } from "./config";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { createWatchStore } from "./stores/watch";

const USAGE = `Usage: folio <inputDir> [--out dir] [--title text] [--strict] [--watch] [--quiet]`;

/** Parse command-line arguments into build settings */
export function parseCli(argv: string[]): {
  inputDir: string;
  config: Partial<SiteConfig>;
  watch: boolean;
} {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      title: { type: "string", short: "t" },
      strict: { type: "boolean" },
      watch: { type: "boolean", short: "w" },
      quiet: { type: "boolean", short: "q" },
    },
  });

  if (positionals.length !== 1) {
    throw new Error(USAGE);
  }

  const config: Partial<SiteConfig> = {};
  if (values.out !== undefined) config.outDir = values.out;
  if (values.title !== undefined) config.title = values.title;
  if (values.strict) config.strictLinks = true;
  if (values.quiet) config.logLevel = "warn";

  return { inputDir: positionals[0], config, watch: values.watch ?? false };
}

/** Changes that should trigger a rebuild: sources and the config file */
export function isWatchedFile(file: string, extensions: readonly string[]): boolean {
  return basename(file) === CONFIG_FILE || extensions.some((ext) => file.endsWith(ext));
}

export async function main(argv: string[]): Promise<number> {
  const logger = createLogger("Folio");
  let options: ReturnType<typeof parseCli>;
  try {
    options = parseCli(argv);
  } catch (e) {
    logger.error(errorMessage(e));
    return 2;
  }

  let extensions: readonly string[] = DEFAULT_CONFIG.extensions;
  const build = async () => {
    const outcome = await buildSite({ inputDir: options.inputDir, config: options.config });
    extensions = outcome.config.extensions;
    return outcome.summary.exitCode;
  };

  let exitCode: number;
  try {
    exitCode = await build();
  } catch (e) {
    logger.error(errorMessage(e));
    return 2;
  }
  if (!options.watch) return exitCode;

  const watcher = createWatchStore({
    dir: options.inputDir,
    rebuild: build,
    filter: (file) => isWatchedFile(file, extensions),
    logger: createLogger("Watch", options.config.logLevel),
  });
  watcher.start();

  // Runs until interrupted, or until the watcher itself fails
  const failed = await new Promise<boolean>((resolve) => {
    const onInterrupt = () => {
      unsubscribe();
      watcher.stop();
      resolve(false);
    };
    const unsubscribe = watcher.subscribe((state) => {
      if (state.watching || state.error === null) return;
      process.off("SIGINT", onInterrupt);
      resolve(true);
    });
    process.once("SIGINT", onInterrupt);
  });
  await watcher.settled();
  return failed ? 2 : exitCode;
}
