import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { SiteConfig } from "./types";
import { ConfigError } from "./lib/errors";

/** Optional per-site settings file, read from the input directory */
export const CONFIG_FILE = "folio.config.json";

export const DEFAULT_CONFIG: SiteConfig = {
  title: "Documentation",
  lang: "en",
  outDir: "site",
  indexFile: "contents.html",
  extensions: [".md", ".markdown"],
  strictLinks: false,
  logLevel: "info",
};

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

const nonEmpty = z
  .string({ invalid_type_error: "expected a non-empty string" })
  .refine((value) => value.trim() !== "", "expected a non-empty string");

const configSchema = z
  .object(
    {
      title: nonEmpty,
      lang: nonEmpty,
      outDir: nonEmpty,
      indexFile: nonEmpty.refine((file) => file.endsWith(".html"), "must end in .html").nullable(),
      extensions: z
        .array(
          z
            .string({ invalid_type_error: "expected an array of strings" })
            .refine(
              (ext) => /^\.[^./\\]+$/.test(ext),
              (ext) => ({ message: `"${ext}" must look like ".md"` }),
            ),
          { invalid_type_error: "expected an array of strings" },
        )
        .min(1, "at least one extension is required"),
      strictLinks: z.boolean({ invalid_type_error: "expected a boolean" }),
      logLevel: z.enum(LOG_LEVELS, {
        errorMap: () => ({ message: `expected one of ${LOG_LEVELS.join(", ")}` }),
      }),
    },
    { invalid_type_error: "expected an object" },
  )
  .strict();

/** The first schema issue, reported against its top-level setting */
function toConfigError(error: z.ZodError): ConfigError {
  const [issue] = error.issues;
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new ConfigError(issue.keys[0], "unknown setting");
  }
  const key = issue.path.length > 0 ? String(issue.path[0]) : "(root)";
  return new ConfigError(key, issue.message);
}

/** Validate untyped settings (e.g. parsed JSON) into a partial config */
export function parseConfig(value: unknown): Partial<SiteConfig> {
  const result = configSchema.partial().safeParse(value);
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}

/** Merge config layers over the defaults; later layers win */
export function resolveConfig(...layers: Partial<SiteConfig>[]): SiteConfig {
  const merged: SiteConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}

/** Read `folio.config.json` from `dir`; a missing file gives no settings */
export async function loadConfigFile(dir: string): Promise<Partial<SiteConfig>> {
  let text: string;
  try {
    text = await readFile(join(dir, CONFIG_FILE), "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
    throw e;
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(CONFIG_FILE, e instanceof Error ? e.message : "invalid JSON");
  }
  return parseConfig(value);
}
