import type { Block, HeadingLevel, LinkBlock, ListItemBlock, TocEntry } from "../types";
import { inlineText, parseInline } from "./inline";

const FENCE_OPEN = /^([ \t]*)(`{3,}|~{3,})[ \t]*([^\s`]*)[^`]*$/;
const HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*))?$/;
const RULE = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM = /^([ \t]*)([-*+]|\d{1,9}[.)])[ \t]+(.*)$/;
const QUOTE = /^ {0,3}>[ \t]?(.*)$/;
const LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

type Pending =
  | { kind: "paragraph"; lines: string[] }
  | { kind: "quote"; lines: string[] }
  | { kind: "listItem"; lines: string[]; ordered: boolean; depth: number; start?: number };

/** Turn heading text into an anchor id */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/\s+/g, "-");
  return slug || "section";
}

/** Hands out unique slugs within one document: intro, intro-1, intro-2 */
function createSlugger() {
  const seen = new Map<string, number>();
  return (text: string): string => {
    const base = slugify(text);
    const count = seen.get(base);
    if (count === undefined) {
      seen.set(base, 0);
      return base;
    }
    let next = count + 1;
    while (seen.has(`${base}-${next}`)) next++;
    seen.set(base, next);
    seen.set(`${base}-${next}`, 0);
    return `${base}-${next}`;
  };
}

function finish(pending: Pending): Block {
  const children = parseInline(pending.lines.join("\n"));
  switch (pending.kind) {
    case "quote":
      return { kind: "quote", children };
    case "listItem": {
      const item: ListItemBlock = {
        kind: "listItem",
        ordered: pending.ordered,
        depth: pending.depth,
        children,
      };
      if (pending.start !== undefined) item.start = pending.start;
      return item;
    }
    case "paragraph": {
      const [only] = children;
      if (children.length === 1 && only.kind === "link") {
        const link: LinkBlock = { kind: "link", href: only.href, children: only.children };
        if (only.title !== undefined) link.title = only.title;
        return link;
      }
      return { kind: "paragraph", children };
    }
  }
}

/**
 * Split markup text into blocks. Fenced code is kept byte-for-byte apart
 * from line endings, which are normalised to "\n".
 */
export function parseBlocks(text: string): Block[] {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const blocks: Block[] = [];
  const slug = createSlugger();
  let pending: Pending | null = null;

  const flush = () => {
    if (pending) {
      blocks.push(finish(pending));
      pending = null;
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    const fence = line.match(FENCE_OPEN);
    if (fence) {
      flush();
      const indent = fence[1].length;
      const marker = fence[2];
      const body: string[] = [];
      let j = i + 1;
      for (; j < lines.length; j++) {
        const close = lines[j].match(/^[ \t]*(`{3,}|~{3,})[ \t]*$/);
        if (close && close[1][0] === marker[0] && close[1].length >= marker.length) break;
        // Strip the fence's own indentation, never more
        body.push(lines[j].replace(new RegExp(`^[ \\t]{0,${indent}}`), ""));
      }
      blocks.push({ kind: "code", language: fence[3] || null, text: body.join("\n") });
      // An unclosed fence runs to the end of the document
      i = j;
      continue;
    }

    if (!line.trim()) {
      flush();
      continue;
    }

    const heading = line.match(HEADING);
    if (heading) {
      flush();
      const level = LEVELS[heading[1].length - 1];
      const children = parseInline((heading[2] ?? "").replace(/[ \t]+#+[ \t]*$/, "").trim());
      blocks.push({ kind: "heading", level, id: slug(inlineText(children)), children });
      continue;
    }

    if (RULE.test(line)) {
      flush();
      blocks.push({ kind: "rule" });
      continue;
    }

    const item = line.match(LIST_ITEM);
    if (item) {
      flush();
      const indent = item[1].replace(/\t/g, "  ").length;
      const marker = item[2];
      const ordered = /^\d/.test(marker);
      pending = { kind: "listItem", lines: [item[3]], ordered, depth: Math.floor(indent / 2) };
      if (ordered) pending.start = parseInt(marker, 10);
      continue;
    }

    const quote = line.match(QUOTE);
    if (quote) {
      if (pending?.kind !== "quote") {
        flush();
        pending = { kind: "quote", lines: [] };
      }
      pending.lines.push(quote[1]);
      continue;
    }

    // Lazy continuation of whatever paragraph-like block is open
    if (pending) {
      pending.lines.push(line.trim());
    } else {
      pending = { kind: "paragraph", lines: [line.trim()] };
    }
  }

  flush();
  return blocks;
}

/** Table of contents from h2-h6 headings */
export function buildToc(blocks: readonly Block[]): TocEntry[] {
  const toc: TocEntry[] = [];
  for (const block of blocks) {
    if (block.kind === "heading" && block.level >= 2) {
      toc.push({ level: block.level, title: inlineText(block.children), id: block.id });
    }
  }
  return toc;
}
