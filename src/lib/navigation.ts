import type { Breadcrumb, Document, DocumentSet, NavigationEdge, NavItem, NavigationTree } from "../types";
import { dirOf, getParentPaths, humanize, isIndexId } from "./paths";

/** One edge per consecutive pair of documents */
export function buildEdges(documents: readonly Document[]): NavigationEdge[] {
  const edges: NavigationEdge[] = [];
  for (let i = 1; i < documents.length; i++) {
    edges.push({ previous: documents[i - 1].id, next: documents[i].id });
  }
  return edges;
}

/** Previous and next documents of `id` along the chain */
export function getNeighbours(
  set: DocumentSet,
  id: string,
): { previous?: Document; next?: Document } {
  const result: { previous?: Document; next?: Document } = {};
  for (const edge of set.edges) {
    if (edge.next === id) result.previous = set.byId.get(edge.previous);
    if (edge.previous === id) result.next = set.byId.get(edge.next);
  }
  return result;
}

/** Index page of a directory ("" for the root), if one was loaded */
export function findIndex(set: DocumentSet, dir: string): Document | undefined {
  return set.documents.find((doc) => isIndexId(doc.id) && dirOf(doc.id) === dir);
}

/**
 * Breadcrumbs from the root index down to the parent directory of `document`.
 * Directories without an index page are skipped.
 */
export function getBreadcrumbs(set: DocumentSet, document: Document): Breadcrumb[] {
  const crumbs: Breadcrumb[] = [];
  const ownDir = isIndexId(document.id) ? dirOf(document.id) : null;

  for (const dir of ["", ...getParentPaths(document.id)]) {
    if (dir === ownDir) break;
    const index = findIndex(set, dir);
    if (index) crumbs.push({ title: index.title, path: index.id });
  }
  return crumbs;
}

/**
 * Group the ordered documents into a tree by directory. A directory's
 * index page gives the directory node its title and link.
 */
export function buildNavigationTree(documents: readonly Document[]): NavigationTree {
  const items: NavItem[] = [];
  const dirs = new Map<string, NavItem>();

  const childrenOf = (dir: string): NavItem[] => {
    if (dir === "") return items;
    let node = dirs.get(dir);
    if (!node) {
      node = { title: humanize(dir.split("/").pop() ?? dir), path: null, children: [] };
      dirs.set(dir, node);
      childrenOf(dirOf(dir)).push(node);
    }
    node.children ??= [];
    return node.children;
  };

  for (const doc of documents) {
    const dir = dirOf(doc.id);
    if (dir !== "" && isIndexId(doc.id)) {
      childrenOf(dir);
      const node = dirs.get(dir);
      if (node) {
        node.title = doc.title;
        node.path = doc.id;
      }
      continue;
    }
    childrenOf(dir).push({ title: doc.title, path: doc.id });
  }

  return { items };
}
