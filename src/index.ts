export type * from "./types";
export { buildSite, renderSite } from "./build";
export type { BuildOptions, BuildOutcome } from "./build";
export { CONFIG_FILE, DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "./config";
export {
  BrokenLinkError,
  ConfigError,
  DuplicateDocumentError,
  MalformedDocumentError,
  SourceUnreadableError,
} from "./lib/errors";
export { createDocumentSet, loadDocument, loadDocuments, readSources } from "./lib/loader";
export { parseBlocks, buildToc, slugify } from "./lib/markup";
export { parseInline, inlineText } from "./lib/inline";
export { resolveLink } from "./lib/links";
export { buildNavigationTree, getBreadcrumbs } from "./lib/navigation";
export { renderDocument, renderIndex, renderPage } from "./lib/renderer";
export type { PageContext, RenderContext, RenderResult } from "./lib/renderer";
export { createBuildStore } from "./stores/build";
export { createSiteStore } from "./stores/site";
export { createSummary } from "./stores/summary";
export { createWatchStore } from "./stores/watch";
