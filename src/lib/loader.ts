import { readdir, readFile } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { TextDecoder } from "node:util";
import type { Document, DocumentSet, Failure, HeadingBlock, RawSource } from "../types";
import { DuplicateDocumentError, MalformedDocumentError, SourceUnreadableError, errorMessage } from "./errors";
import { inlineText } from "./inline";
import { DEFAULT_EXTENSIONS } from "./links";
import { buildToc, parseBlocks } from "./markup";
import { buildEdges } from "./navigation";
import { comparePaths, dirOf, humanize, isIndexId, normalizeId, stemOf, toOutputPath } from "./paths";

export interface LoadResult {
  set: DocumentSet;
  failures: Failure[];
}

export interface ReadResult {
  sources: RawSource[];
  failures: Failure[];
}

/** Decode bytes as strict UTF-8; strings pass through */
export function decodeContent(id: string, content: string | Uint8Array): string {
  if (typeof content === "string") return content.replace(/^\uFEFF/, "");
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(content);
  } catch (e) {
    throw new MalformedDocumentError(id, `not valid UTF-8 (${errorMessage(e)})`);
  }
}

function fallbackTitle(id: string): string {
  if (!isIndexId(id)) return humanize(stemOf(id));
  const dir = dirOf(id);
  return dir ? humanize(dir.split("/").pop() ?? dir) : "Home";
}

/** Build one frozen document from a raw source */
export function loadDocument(source: RawSource): Document {
  const id = normalizeId(source.id);
  if (!id || id.endsWith("/")) {
    throw new MalformedDocumentError(source.id, "empty identifier");
  }
  if (id.split("/").includes("..")) {
    throw new MalformedDocumentError(source.id, "identifier escapes the document root");
  }

  const raw = decodeContent(id, source.content);
  const blocks = parseBlocks(raw);
  const heading = blocks.find((block): block is HeadingBlock => block.kind === "heading");
  const title = (heading && inlineText(heading.children).trim()) || fallbackTitle(id);

  return Object.freeze({
    id,
    raw,
    title,
    blocks: Object.freeze(blocks),
    toc: Object.freeze(buildToc(blocks)),
    outputPath: toOutputPath(id),
  });
}

/** Wrap ordered documents with id lookup and the navigation chain */
export function createDocumentSet(documents: readonly Document[]): DocumentSet {
  return Object.freeze({
    documents: Object.freeze([...documents]),
    byId: new Map(documents.map((doc) => [doc.id, doc])),
    edges: Object.freeze(buildEdges(documents)),
  });
}

/**
 * Load sources one after another. A malformed or duplicate source is
 * reported as a failure and the rest are still loaded.
 */
export function loadDocuments(sources: readonly RawSource[]): LoadResult {
  const documents: Document[] = [];
  const seen = new Set<string>();
  const failures: Failure[] = [];

  for (const source of sources) {
    try {
      const doc = loadDocument(source);
      if (seen.has(doc.id)) throw new DuplicateDocumentError(doc.id);
      seen.add(doc.id);
      documents.push(doc);
    } catch (e) {
      failures.push({ id: source.id, stage: "load", message: errorMessage(e) });
    }
  }

  return { set: createDocumentSet(documents), failures };
}

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Read every source file under `dir` in document order. A missing or
 * unreadable directory is fatal; a single unreadable file is a failure.
 */
export async function readSources(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS,
): Promise<ReadResult> {
  let files: string[];
  try {
    files = await walk(dir);
  } catch (e) {
    throw new SourceUnreadableError(dir, e);
  }

  const ids = files
    .map((file) => relative(dir, file).split(sep).join("/"))
    .filter((id) => extensions.some((ext) => id.toLowerCase().endsWith(ext.toLowerCase())))
    .sort(comparePaths);

  const sources: RawSource[] = [];
  const failures: Failure[] = [];
  for (const id of ids) {
    try {
      sources.push({ id, content: await readFile(join(dir, id)) });
    } catch (e) {
      failures.push({ id, stage: "load", message: errorMessage(e) });
    }
  }
  return { sources, failures };
}
