/** Inline span inside a heading, paragraph, list item or quote */
export type Inline =
  | { kind: "text"; value: string }
  | { kind: "code"; value: string }
  | { kind: "emphasis"; children: Inline[] }
  | { kind: "strong"; children: Inline[] }
  | { kind: "link"; href: string; title?: string; children: Inline[] }
  | { kind: "image"; src: string; alt: string; title?: string };

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingBlock {
  kind: "heading";
  level: HeadingLevel;
  /** Slug, unique within the document */
  id: string;
  children: Inline[];
}

export interface ParagraphBlock {
  kind: "paragraph";
  children: Inline[];
}

export interface CodeBlock {
  kind: "code";
  language: string | null;
  /** Verbatim content, never reinterpreted */
  text: string;
}

/** A paragraph made of a single link, e.g. "[Next: Functions](functions.md)" */
export interface LinkBlock {
  kind: "link";
  href: string;
  title?: string;
  children: Inline[];
}

export interface ListItemBlock {
  kind: "listItem";
  ordered: boolean;
  depth: number;
  /** Number written on an ordered item */
  start?: number;
  children: Inline[];
}

export interface QuoteBlock {
  kind: "quote";
  children: Inline[];
}

export interface RuleBlock {
  kind: "rule";
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | CodeBlock
  | LinkBlock
  | ListItemBlock
  | QuoteBlock
  | RuleBlock;

/** Table of contents entry */
export interface TocEntry {
  level: number; // 2-6 (h2-h6)
  title: string;
  id: string;
}

/** Breadcrumb navigation item */
export interface Breadcrumb {
  title: string;
  /** Document id of the linked page */
  path: string;
}

/** One loaded page, frozen after load */
export interface Document {
  readonly id: string;
  readonly raw: string;
  readonly title: string;
  readonly blocks: readonly Block[];
  readonly toc: readonly TocEntry[];
  /** Path of the rendered page relative to the output directory */
  readonly outputPath: string;
}

/** Previous/next relation between two consecutive documents */
export interface NavigationEdge {
  previous: string;
  next: string;
}

/** Navigation tree item derived from the ordered document list */
export interface NavItem {
  title: string;
  /** Document id, or null for a directory without an index page */
  path: string | null;
  children?: NavItem[];
}

/** Complete navigation tree */
export interface NavigationTree {
  items: NavItem[];
}

/** Ordered, id-unique collection of loaded documents */
export interface DocumentSet {
  readonly documents: readonly Document[];
  readonly byId: ReadonlyMap<string, Document>;
  readonly edges: readonly NavigationEdge[];
}

/** Raw text source handed to the loader */
export interface RawSource {
  id: string;
  content: string | Uint8Array;
}

/** A source or document that could not be processed */
export interface Failure {
  id: string;
  stage: "load" | "render" | "write";
  message: string;
}

/** A recovered problem, currently only broken links */
export interface Warning {
  id: string;
  href: string;
  message: string;
}

/** Rendered page ready to be written */
export interface RenderedPage {
  id: string;
  outputPath: string;
  title: string;
  html: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface SiteConfig {
  title: string;
  lang: string;
  /**
   * Output directory. Relative paths from folio.config.json resolve
   * against the input directory; any other relative path against the
   * working directory.
   */
  outDir: string;
  /** File name of the table-of-contents page, or null to skip it */
  indexFile: string | null;
  extensions: string[];
  strictLinks: boolean;
  logLevel: LogLevel;
}

export interface BuildSummary {
  documents: number;
  pages: number;
  warnings: number;
  failures: number;
  /** Fatal problem that stopped the run, e.g. an unreadable input directory */
  error: string | null;
  /** 0 clean, 1 warnings only, 2 failures */
  exitCode: 0 | 1 | 2;
}
