import type { Document, DocumentSet } from "../types";
import { BrokenLinkError } from "./errors";
import { relativeHref } from "./paths";

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const ROOT = "http://folio.invalid/";

export const DEFAULT_EXTENSIONS: readonly string[] = [".md", ".markdown"];

export type LinkResolution =
  | { kind: "external"; href: string }
  | { kind: "internal"; href: string; targetId: string }
  | { kind: "broken"; error: BrokenLinkError };

/** Links with a scheme (http:, mailto:, tel:) or protocol-relative ones */
export function isExternal(href: string): boolean {
  return SCHEME.test(href) || href.startsWith("//");
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Split "page.md?x=1#intro" into its path and fragment */
export function splitHref(href: string): { path: string; fragment?: string } {
  const hashAt = href.indexOf("#");
  const beforeHash = hashAt === -1 ? href : href.slice(0, hashAt);
  const queryAt = beforeHash.indexOf("?");
  const path = queryAt === -1 ? beforeHash : beforeHash.slice(0, queryAt);
  if (hashAt === -1) return { path };
  return { path, fragment: safeDecode(href.slice(hashAt + 1)) };
}

/** Anchor ids of every heading in a document */
export function headingIds(document: Document): Set<string> {
  const ids = new Set<string>();
  for (const block of document.blocks) {
    if (block.kind === "heading") ids.add(block.id);
  }
  return ids;
}

/**
 * Resolve a link path against the linking document's directory.
 * Absolute paths start from the root; the target may be written with or
 * without its extension, or as a directory holding an index page.
 */
export function findTarget(
  path: string,
  fromId: string,
  documents: DocumentSet,
  extensions: readonly string[] = DEFAULT_EXTENSIONS,
): Document | undefined {
  const resolved = new URL(path, new URL(fromId, ROOT));
  const id = safeDecode(resolved.pathname).replace(/^\/+/, "");

  const candidates =
    id === "" || id.endsWith("/")
      ? extensions.map((ext) => `${id}index${ext}`)
      : [id, ...extensions.map((ext) => `${id}${ext}`), ...extensions.map((ext) => `${id}/index${ext}`)];

  for (const candidate of candidates) {
    const document = documents.byId.get(candidate);
    if (document) return document;
  }
  return undefined;
}

/** Resolve an href found in `from` to a rendered-page href */
export function resolveLink(
  href: string,
  from: Document,
  documents: DocumentSet,
  extensions: readonly string[] = DEFAULT_EXTENSIONS,
): LinkResolution {
  if (isExternal(href)) {
    return { kind: "external", href };
  }

  const { path, fragment } = splitHref(href);
  const suffix = fragment === undefined ? "" : `#${encodeURIComponent(fragment)}`;

  const target = path === "" ? from : findTarget(path, from.id, documents, extensions);
  if (!target) {
    return { kind: "broken", error: new BrokenLinkError(from.id, href) };
  }
  if (fragment && !headingIds(target).has(fragment)) {
    return { kind: "broken", error: new BrokenLinkError(from.id, href, fragment) };
  }

  if (target === from && path === "") {
    return { kind: "internal", href: suffix || "#", targetId: target.id };
  }
  return {
    kind: "internal",
    href: relativeHref(from.outputPath, target.outputPath) + suffix,
    targetId: target.id,
  };
}
