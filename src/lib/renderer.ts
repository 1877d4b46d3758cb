import type {
  Block,
  Document,
  DocumentSet,
  Inline,
  ListItemBlock,
  NavItem,
  RenderedPage,
  SiteConfig,
} from "../types";
import type { BrokenLinkError } from "./errors";
import { attrs, escapeHtml } from "./html";
import { DEFAULT_EXTENSIONS, resolveLink } from "./links";
import { buildNavigationTree, getBreadcrumbs, getNeighbours } from "./navigation";
import { relativeHref } from "./paths";

/** Everything besides the document that rendering depends on */
export interface RenderContext {
  documents: DocumentSet;
  /** Throw on broken links instead of emitting disabled links */
  strictLinks?: boolean;
  extensions?: readonly string[];
}

export interface PageContext extends RenderContext {
  siteTitle: string;
  lang: string;
  /** Output path of the table-of-contents page, linked from every page */
  indexFile?: string | null;
}

export interface RenderResult {
  html: string;
  warnings: BrokenLinkError[];
}

export interface PageResult {
  page: RenderedPage;
  warnings: BrokenLinkError[];
}

interface RenderState {
  document: Document;
  context: RenderContext;
  warnings: BrokenLinkError[];
}

function renderLink(
  state: RenderState,
  href: string,
  title: string | undefined,
  children: readonly Inline[],
): string {
  const { document, context } = state;
  const label = renderInlines(state, children);
  const resolution = resolveLink(href, document, context.documents, context.extensions ?? DEFAULT_EXTENSIONS);

  switch (resolution.kind) {
    case "external":
    case "internal":
      return `<a${attrs({ href: resolution.href, title })}>${label}</a>`;
    case "broken":
      if (context.strictLinks) throw resolution.error;
      state.warnings.push(resolution.error);
      return `<a${attrs({ class: "broken-link", "aria-disabled": "true", title })}>${label}</a>`;
  }
}

function renderInlines(state: RenderState, nodes: readonly Inline[]): string {
  return nodes
    .map((node) => {
      switch (node.kind) {
        case "text":
          return escapeHtml(node.value);
        case "code":
          return `<code>${escapeHtml(node.value)}</code>`;
        case "emphasis":
          return `<em>${renderInlines(state, node.children)}</em>`;
        case "strong":
          return `<strong>${renderInlines(state, node.children)}</strong>`;
        case "link":
          return renderLink(state, node.href, node.title, node.children);
        case "image":
          return `<img${attrs({ src: node.src, alt: node.alt, title: node.title })}>`;
      }
    })
    .join("");
}

/** Group consecutive list items into nested lists by depth */
function renderList(state: RenderState, items: ListItemBlock[]): string {
  let html = "";
  const stack: { tag: "ul" | "ol"; depth: number }[] = [];
  const top = () => stack[stack.length - 1];

  for (const item of items) {
    const tag = item.ordered ? "ol" : "ul";

    while (stack.length > 0 && top().depth > item.depth) {
      html += `</li></${top().tag}>`;
      stack.pop();
    }

    if (stack.length > 0 && top().depth === item.depth) {
      if (top().tag === tag) {
        html += "</li>";
      } else {
        html += `</li></${top().tag}>`;
        stack.pop();
      }
    }

    if (stack.length === 0 || item.depth > top().depth) {
      const start = tag === "ol" && item.start !== undefined && item.start !== 1 ? String(item.start) : undefined;
      html += `<${tag}${attrs({ start })}>`;
      stack.push({ tag, depth: item.depth });
    }

    html += `<li>${renderInlines(state, item.children)}`;
  }

  while (stack.length > 0) {
    html += `</li></${top().tag}>`;
    stack.pop();
  }
  return html;
}

function renderBlock(state: RenderState, block: Exclude<Block, ListItemBlock>): string {
  switch (block.kind) {
    case "heading":
      return `<h${block.level}${attrs({ id: block.id })}>${renderInlines(state, block.children)}</h${block.level}>`;
    case "paragraph":
      return `<p>${renderInlines(state, block.children)}</p>`;
    case "code": {
      const className = block.language ? `language-${block.language}` : undefined;
      return `<pre><code${attrs({ class: className })}>${escapeHtml(block.text)}</code></pre>`;
    }
    case "link":
      return `<p class="link">${renderLink(state, block.href, block.title, block.children)}</p>`;
    case "quote":
      return `<blockquote><p>${renderInlines(state, block.children)}</p></blockquote>`;
    case "rule":
      return "<hr>";
  }
}

/**
 * Render a document body to HTML. Pure: the same document and context
 * always give the same output. Broken links are collected as warnings
 * unless `strictLinks` is set, in which case the first one is thrown.
 */
export function renderDocument(document: Document, context: RenderContext): RenderResult {
  const state: RenderState = { document, context, warnings: [] };
  const parts: string[] = [];
  let list: ListItemBlock[] = [];

  for (const block of document.blocks) {
    if (block.kind === "listItem") {
      list.push(block);
      continue;
    }
    if (list.length > 0) {
      parts.push(renderList(state, list));
      list = [];
    }
    parts.push(renderBlock(state, block));
  }
  if (list.length > 0) parts.push(renderList(state, list));

  return { html: parts.join("\n"), warnings: state.warnings };
}

function pageLink(from: Document, to: Document, rel: string, label: string): string {
  return `<a${attrs({ href: relativeHref(from.outputPath, to.outputPath), rel })}>${label}${escapeHtml(to.title)}</a>`;
}

/** Render a full HTML page: breadcrumbs, table of contents, body and pager */
export function renderPage(document: Document, context: PageContext): PageResult {
  const { html: body, warnings } = renderDocument(document, context);
  const sections: string[] = [];

  const crumbs = getBreadcrumbs(context.documents, document);
  if (crumbs.length > 0) {
    const links = crumbs.map((crumb) => {
      const target = context.documents.byId.get(crumb.path);
      const href = target ? relativeHref(document.outputPath, target.outputPath) : undefined;
      return `<li><a${attrs({ href })}>${escapeHtml(crumb.title)}</a></li>`;
    });
    sections.push(`<nav class="breadcrumbs"><ol>${links.join("")}</ol></nav>`);
  }

  if (document.toc.length >= 2) {
    const entries = document.toc.map(
      (entry) =>
        `<li${attrs({ class: `toc-level-${entry.level}` })}><a${attrs({ href: `#${entry.id}` })}>${escapeHtml(entry.title)}</a></li>`,
    );
    sections.push(`<aside class="toc"><ul>${entries.join("")}</ul></aside>`);
  }

  sections.push(`<article>\n${body}\n</article>`);

  const { previous, next } = getNeighbours(context.documents, document.id);
  if (previous || next) {
    const links: string[] = [];
    if (previous) links.push(pageLink(document, previous, "prev", "&larr; "));
    if (next) links.push(pageLink(document, next, "next", "&rarr; "));
    sections.push(`<nav class="pager">${links.join("")}</nav>`);
  }

  if (context.indexFile) {
    const href = relativeHref(document.outputPath, context.indexFile);
    sections.push(`<footer><a${attrs({ href })}>Contents</a></footer>`);
  }

  const html = [
    "<!DOCTYPE html>",
    `<html${attrs({ lang: context.lang })}>`,
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(`${document.title} - ${context.siteTitle}`)}</title>`,
    "</head>",
    "<body>",
    ...sections,
    "</body>",
    "</html>",
    "",
  ].join("\n");

  return {
    page: { id: document.id, outputPath: document.outputPath, title: document.title, html },
    warnings,
  };
}

function renderNavItems(items: readonly NavItem[], set: DocumentSet, fromOutput: string): string {
  const entries = items.map((item) => {
    const target = item.path === null ? undefined : set.byId.get(item.path);
    const label = escapeHtml(item.title);
    const link = target ? `<a${attrs({ href: relativeHref(fromOutput, target.outputPath) })}>${label}</a>` : label;
    const nested = item.children && item.children.length > 0 ? renderNavItems(item.children, set, fromOutput) : "";
    return `<li>${link}${nested}</li>`;
  });
  return `<ul>${entries.join("")}</ul>`;
}

/** Table-of-contents page listing every document, grouped by directory */
export function renderIndex(set: DocumentSet, config: Pick<SiteConfig, "title" | "lang">, outputPath: string): RenderedPage {
  const tree = buildNavigationTree(set.documents);
  const title = "Contents";
  const html = [
    "<!DOCTYPE html>",
    `<html${attrs({ lang: config.lang })}>`,
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(`${title} - ${config.title}`)}</title>`,
    "</head>",
    "<body>",
    `<h1>${escapeHtml(config.title)}</h1>`,
    `<nav class="contents">${renderNavItems(tree.items, set, outputPath)}</nav>`,
    "</body>",
    "</html>",
    "",
  ].join("\n");

  return { id: outputPath, outputPath, title, html };
}
