import { posix } from "node:path";

const collator = new Intl.Collator("en", { numeric: true, sensitivity: "base" });

/** Normalise a source identifier to a POSIX path relative to the root */
export function normalizeId(id: string): string {
  return id
    .replace(/\\/g, "/")
    .replace(/^(?:\.\/|\/)+/, "")
    .replace(/\/{2,}/g, "/");
}

/** File name without its extension */
export function stemOf(id: string): string {
  const base = posix.basename(id);
  return base.slice(0, base.length - posix.extname(base).length);
}

/** Directory part of an id, "" at the root */
export function dirOf(id: string): string {
  const dir = posix.dirname(id);
  return dir === "." ? "" : dir;
}

export function isIndexId(id: string): boolean {
  return stemOf(id).toLowerCase() === "index";
}

/** Rendered page path: guide/intro.md -> guide/intro.html */
export function toOutputPath(id: string): string {
  return posix.join(dirOf(id), `${stemOf(id)}.html`);
}

/**
 * Relative href from one output file to another,
 * e.g. "guide/a.html" -> "ref/b.html" gives "../ref/b.html".
 */
export function relativeHref(fromOutput: string, toOutput: string): string {
  const rel = posix.relative(posix.dirname(fromOutput), toOutput) || posix.basename(toOutput);
  return rel.split("/").map(encodeURIComponent).join("/");
}

/** Directory ancestors of an id: "guide/advanced/x.md" -> ["guide", "guide/advanced"] */
export function getParentPaths(id: string): string[] {
  const parts = id.split("/").slice(0, -1);
  const paths: string[] = [];
  let current = "";
  for (const part of parts) {
    current = current ? `${current}/${part}` : part;
    paths.push(current);
  }
  return paths;
}

/** "02-getting_started" -> "Getting started" */
export function humanize(name: string): string {
  const words = name
    .replace(/^\d+(?:\.\d+)*[-_ ]+/, "")
    .replace(/[-_]+/g, " ")
    .trim();
  if (!words) return name;
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Document order: index pages first within their directory, then a
 * numeric-aware comparison segment by segment.
 */
export function comparePaths(a: string, b: string): number {
  const sa = a.split("/");
  const sb = b.split("/");
  const shared = Math.min(sa.length, sb.length);

  for (let i = 0; i < shared; i++) {
    const lastA = i === sa.length - 1;
    const lastB = i === sb.length - 1;
    const indexA = lastA && isIndexId(sa[i]);
    const indexB = lastB && isIndexId(sb[i]);
    if (indexA !== indexB) return indexA ? -1 : 1;

    const cmp = collator.compare(lastA ? stemOf(sa[i]) : sa[i], lastB ? stemOf(sb[i]) : sb[i]);
    if (cmp !== 0) return cmp;
  }

  if (sa.length !== sb.length) return sa.length - sb.length;
  return a < b ? -1 : a > b ? 1 : 0;
}
