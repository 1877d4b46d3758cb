import type { Inline } from "../types";

const ESCAPABLE = /[!-/:-@[-`{-~]/;
const WORD_CHAR = /[\p{L}\p{N}]/u;
const WHITESPACE = /\s/;

interface Span {
  end: number;
}

interface CodeSpan extends Span {
  value: string;
}

interface LinkSpan extends Span {
  label: string;
  href: string;
  title?: string;
}

function countRun(source: string, start: number, ch: string): number {
  let end = start;
  while (source[end] === ch) end++;
  return end - start;
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

function unescape(value: string): string {
  return value.replace(/\\([!-/:-@[-`{-~])/g, "$1");
}

/**
 * Read a code span opening at `start`. The closing run must have exactly
 * as many backticks as the opening one.
 */
function readCodeSpan(source: string, start: number): CodeSpan | null {
  const run = countRun(source, start, "`");
  let j = start + run;
  while (j < source.length) {
    if (source[j] !== "`") {
      j++;
      continue;
    }
    const close = countRun(source, j, "`");
    if (close === run) {
      let value = source.slice(start + run, j);
      // One surrounding space is padding, e.g. `` `tick` ``
      if (value.length >= 2 && value.startsWith(" ") && value.endsWith(" ") && value.trim() !== "") {
        value = value.slice(1, -1);
      }
      return { value, end: j + close };
    }
    j += close;
  }
  return null;
}

/** Read `[label](href "title")` opening at `start` (the `[`). */
function readLink(source: string, start: number): LinkSpan | null {
  let depth = 0;
  let j = start;
  for (; j < source.length; j++) {
    const c = source[j];
    if (c === "\\") {
      j++;
    } else if (c === "`") {
      const span = readCodeSpan(source, j);
      if (span) j = span.end - 1;
    } else if (c === "[") {
      depth++;
    } else if (c === "]") {
      depth--;
      if (depth === 0) break;
    }
  }
  if (j >= source.length || source[j + 1] !== "(") return null;

  const label = source.slice(start + 1, j);
  let k = j + 2;
  while (source[k] === " ") k++;

  let href: string;
  if (source[k] === "<") {
    const close = source.indexOf(">", k);
    if (close === -1) return null;
    href = source.slice(k + 1, close);
    k = close + 1;
  } else {
    const hrefStart = k;
    let parens = 0;
    while (k < source.length) {
      const c = source[k];
      if (c === "\\") {
        k += 2;
        continue;
      }
      if (c === " " || c === "\n") break;
      if (c === "(") parens++;
      if (c === ")") {
        if (parens === 0) break;
        parens--;
      }
      k++;
    }
    href = source.slice(hrefStart, k);
  }

  while (source[k] === " " || source[k] === "\n") k++;
  let title: string | undefined;
  const quote = source[k];
  if (quote === '"' || quote === "'") {
    const close = source.indexOf(quote, k + 1);
    if (close === -1) return null;
    title = unescape(source.slice(k + 1, close));
    k = close + 1;
    while (source[k] === " ") k++;
  }
  if (source[k] !== ")") return null;

  const link: LinkSpan = { label, href: unescape(href), end: k + 1 };
  if (title !== undefined) link.title = title;
  return link;
}

/**
 * Find the closing delimiter for an emphasis run of `size` characters.
 * Nested runs of a different size are skipped over as a whole.
 */
function findCloser(source: string, from: number, ch: string, size: number): number {
  let j = from;
  while (j < source.length) {
    const c = source[j];
    if (c === "\\") {
      j += 2;
      continue;
    }
    if (c === "`") {
      const span = readCodeSpan(source, j);
      j = span ? span.end : j + countRun(source, j, "`");
      continue;
    }
    if (c !== ch) {
      j++;
      continue;
    }
    const run = countRun(source, j, ch);
    const closes =
      j > from &&
      !WHITESPACE.test(source[j - 1]) &&
      (ch !== "_" || !isWordChar(source[j + run]));
    if (closes && size === 1 && run === 1) return j;
    if (closes && size === 2 && run >= 2) return j + run - 2;
    j += run;
  }
  return -1;
}

function readEmphasis(source: string, start: number): (Span & { node: Inline }) | null {
  const ch = source[start];
  const run = countRun(source, start, ch);
  if (ch === "_" && isWordChar(source[start - 1])) return null;

  for (const size of run >= 2 ? [2, 1] : [1]) {
    const after = source[start + size];
    if (after === undefined || WHITESPACE.test(after)) continue;
    const close = findCloser(source, start + size, ch, size);
    if (close === -1) continue;
    const children = parseInline(source.slice(start + size, close));
    const node: Inline =
      size === 2 ? { kind: "strong", children } : { kind: "emphasis", children };
    return { node, end: close + size };
  }
  return null;
}

/** Parse inline markup: code spans, emphasis, strong, links and images */
export function parseInline(source: string): Inline[] {
  const nodes: Inline[] = [];
  let text = "";
  let i = 0;

  const flush = () => {
    if (text) {
      nodes.push({ kind: "text", value: text });
      text = "";
    }
  };

  while (i < source.length) {
    const ch = source[i];

    if (ch === "\\" && i + 1 < source.length && ESCAPABLE.test(source[i + 1])) {
      text += source[i + 1];
      i += 2;
      continue;
    }

    if (ch === "`") {
      const span = readCodeSpan(source, i);
      if (span) {
        flush();
        nodes.push({ kind: "code", value: span.value });
        i = span.end;
      } else {
        // Unmatched run stays literal
        const run = countRun(source, i, "`");
        text += source.slice(i, i + run);
        i += run;
      }
      continue;
    }

    if (ch === "!" && source[i + 1] === "[") {
      const link = readLink(source, i + 1);
      if (link) {
        flush();
        const image: Inline = {
          kind: "image",
          src: link.href,
          alt: inlineText(parseInline(link.label)),
        };
        if (link.title !== undefined) image.title = link.title;
        nodes.push(image);
        i = link.end;
        continue;
      }
    }

    if (ch === "[") {
      const link = readLink(source, i);
      if (link) {
        flush();
        const node: Inline = { kind: "link", href: link.href, children: parseInline(link.label) };
        if (link.title !== undefined) node.title = link.title;
        nodes.push(node);
        i = link.end;
        continue;
      }
    }

    if (ch === "*" || ch === "_") {
      const span = readEmphasis(source, i);
      if (span) {
        flush();
        nodes.push(span.node);
        i = span.end;
      } else {
        const run = countRun(source, i, ch);
        text += source.slice(i, i + run);
        i += run;
      }
      continue;
    }

    text += ch;
    i++;
  }

  flush();
  return nodes;
}

/** Plain text of inline nodes, used for titles and slugs */
export function inlineText(nodes: readonly Inline[]): string {
  return nodes
    .map((node) => {
      switch (node.kind) {
        case "text":
        case "code":
          return node.value;
        case "image":
          return node.alt;
        default:
          return inlineText(node.children);
      }
    })
    .join("");
}
