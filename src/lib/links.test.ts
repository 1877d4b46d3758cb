import { describe, it, expect } from "vitest";
import { BrokenLinkError } from "./errors";
import { loadDocuments } from "./loader";
import { isExternal, resolveLink, splitHref } from "./links";

const { set } = loadDocuments([
  { id: "index.md", content: "# Home" },
  { id: "guide/index.md", content: "# Guide" },
  { id: "guide/intro.md", content: "# Intro\n\n## Setup" },
  { id: "ref/api.md", content: "# API" },
]);

function doc(id: string) {
  const found = set.byId.get(id);
  if (!found) throw new Error(`fixture missing: ${id}`);
  return found;
}

describe("isExternal", () => {
  it("detects scheme and protocol-relative links", () => {
    expect(isExternal("https://kotlinlang.org")).toBe(true);
    expect(isExternal("mailto:someone@example.com")).toBe(true);
    expect(isExternal("//cdn.example.com/x.js")).toBe(true);
  });

  it("treats paths and fragments as internal", () => {
    expect(isExternal("guide.md")).toBe(false);
    expect(isExternal("#setup")).toBe(false);
  });
});

describe("splitHref", () => {
  it("drops the query and decodes the fragment", () => {
    expect(splitHref("a.md?x=1#caf%C3%A9")).toEqual({ path: "a.md", fragment: "café" });
  });

  it("returns only the path without a fragment", () => {
    expect(splitHref("a.md")).toEqual({ path: "a.md" });
  });
});

describe("resolveLink", () => {
  it("leaves external links untouched", () => {
    expect(resolveLink("https://example.com/a", doc("index.md"), set)).toEqual({
      kind: "external",
      href: "https://example.com/a",
    });
  });

  it("resolves relative paths to rendered pages", () => {
    expect(resolveLink("../ref/api.md", doc("guide/intro.md"), set)).toEqual({
      kind: "internal",
      href: "../ref/api.html",
      targetId: "ref/api.md",
    });
  });

  it("accepts targets without an extension", () => {
    expect(resolveLink("../ref/api", doc("guide/intro.md"), set)).toEqual({
      kind: "internal",
      href: "../ref/api.html",
      targetId: "ref/api.md",
    });
  });

  it("resolves a directory to its index page", () => {
    expect(resolveLink("./", doc("guide/intro.md"), set)).toEqual({
      kind: "internal",
      href: "index.html",
      targetId: "guide/index.md",
    });
  });

  it("resolves absolute paths from the root", () => {
    expect(resolveLink("/index.md", doc("guide/intro.md"), set)).toEqual({
      kind: "internal",
      href: "../index.html",
      targetId: "index.md",
    });
  });

  it("keeps fragments that name a heading", () => {
    expect(resolveLink("intro.md#setup", doc("guide/index.md"), set)).toEqual({
      kind: "internal",
      href: "intro.html#setup",
      targetId: "guide/intro.md",
    });
  });

  it("resolves same-page fragments", () => {
    expect(resolveLink("#setup", doc("guide/intro.md"), set)).toEqual({
      kind: "internal",
      href: "#setup",
      targetId: "guide/intro.md",
    });
  });

  it("reports a missing target", () => {
    const result = resolveLink("missing.md", doc("guide/intro.md"), set);

    expect(result.kind).toBe("broken");
    if (result.kind !== "broken") return;
    expect(result.error).toBeInstanceOf(BrokenLinkError);
    expect(result.error.href).toBe("missing.md");
    expect(result.error.message).toBe("Broken link in guide/intro.md: missing.md");
  });

  it("reports a fragment with no matching heading", () => {
    const result = resolveLink("intro.md#nope", doc("guide/index.md"), set);

    expect(result.kind).toBe("broken");
    if (result.kind !== "broken") return;
    expect(result.error.fragment).toBe("nope");
    expect(result.error.message).toBe(
      "Broken link in guide/index.md: intro.md#nope (no heading #nope)",
    );
  });
});
