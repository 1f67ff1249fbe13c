import { describe, expect, it } from "vitest";
import { normalizeOptions } from "../src/lib/options.js";
import { resolve, targetKey } from "../src/lib/resolve.js";
import type { DocumentBase, RawLink } from "../src/lib/types.js";

const link = (text: string): RawLink => ({
  text,
  kind: "markdown-link",
  offset: 0,
  line: 1,
  column: 1,
  index: 0,
});

const none: DocumentBase = { kind: "none" };
const defaults = normalizeOptions();

describe("resolve", () => {
  it("resolves a relative file link with an anchor against the document", () => {
    const raw = link("./foo.md#bar");
    const out = resolve(raw, { kind: "file", path: "docs/index.md" }, defaults);

    expect(out).toEqual({ kind: "file", path: "docs/foo.md", anchor: "bar", link: raw });
  });

  it("resolves relative links against a url base", () => {
    const out = resolve(
      link("../b?x=1#y"),
      { kind: "url", url: "https://example.com/a/c/page.html" },
      defaults
    );

    expect(out).toMatchObject({ kind: "web", url: "https://example.com/a/b?x=1#y" });
  });

  it("gives protocol-relative links https without a url base", () => {
    expect(resolve(link("//cdn.example.com/x.js"), none, defaults)).toMatchObject({
      kind: "web",
      url: "https://cdn.example.com/x.js",
    });
  });

  it("falls back to https when the url base does not parse", () => {
    expect(
      resolve(link("//example.com/a"), { kind: "url", url: "http://" }, defaults)
    ).toMatchObject({ kind: "web", url: "https://example.com/a" });
  });

  it("turns mailto links and bare addresses into mail targets", () => {
    expect(resolve(link("mailto:a@example.com?subject=hi"), none, defaults)).toMatchObject({
      kind: "mail",
      address: "a@example.com",
    });
    expect(resolve(link("x@example.com"), none, defaults)).toMatchObject({
      kind: "mail",
      address: "x@example.com",
    });
  });

  it("converts file urls to paths", () => {
    expect(resolve(link("file:///tmp/a.md#x"), none, defaults)).toMatchObject({
      kind: "file",
      path: "/tmp/a.md",
      anchor: "x",
    });
  });

  it("skips other schemes, bare anchors and relative links without a base", () => {
    expect(resolve(link("ftp://example.com/f"), none, defaults)).toMatchObject({
      kind: "skip",
      reason: "unsupported_scheme",
      url: "ftp://example.com/f",
    });
    expect(resolve(link("#intro"), none, defaults)).toMatchObject({
      kind: "skip",
      reason: "anchor_only",
    });
    expect(resolve(link("guide.md"), none, defaults)).toMatchObject({
      kind: "skip",
      reason: "invalid",
    });
    expect(resolve(link("   "), none, defaults)).toMatchObject({
      kind: "skip",
      reason: "invalid",
    });
  });

  it("checks same-document anchors when anchors are enabled", () => {
    const options = normalizeOptions({ checkAnchors: true });
    expect(resolve(link("#intro"), { kind: "file", path: "/repo/a.md" }, options)).toMatchObject({
      kind: "file",
      path: "/repo/a.md",
      anchor: "intro",
    });
  });

  it("keeps root-absolute and escaping paths inside rootDir", () => {
    const base: DocumentBase = { kind: "file", path: "/repo/docs/a.md" };

    expect(resolve(link("/abs.md"), base, defaults)).toMatchObject({
      kind: "skip",
      reason: "outside_root",
    });

    const rooted = normalizeOptions({ rootDir: "/repo" });
    expect(resolve(link("/abs.md"), base, rooted)).toMatchObject({
      kind: "file",
      path: "/repo/abs.md",
    });
    expect(resolve(link("../../etc/passwd"), base, rooted)).toMatchObject({
      kind: "skip",
      reason: "outside_root",
      url: "/etc/passwd",
    });
  });

  it("applies exclude patterns", () => {
    const options = normalizeOptions({ exclude: ["example\\.org"] });

    expect(resolve(link("https://example.org/x"), none, options)).toMatchObject({
      kind: "skip",
      reason: "excluded",
    });
    expect(resolve(link("https://example.com/x"), none, options)).toMatchObject({
      kind: "web",
    });
  });

  it("lets include patterns win over exclude patterns", () => {
    const options = normalizeOptions({ include: ["docs"], exclude: ["example"] });

    expect(resolve(link("https://example.com/docs"), none, options)).toMatchObject({
      kind: "web",
    });
    expect(resolve(link("https://example.com/blog"), none, options)).toMatchObject({
      kind: "skip",
      reason: "excluded",
      detail: "not matched by any include pattern",
    });
  });

  it("excludes private hosts when asked", () => {
    const options = normalizeOptions({ skipPrivate: true });

    expect(resolve(link("http://192.168.1.10/"), none, options)).toMatchObject({
      kind: "skip",
      reason: "private_address",
      detail: "private host",
    });
    expect(resolve(link("http://localhost:3000/"), none, options)).toMatchObject({
      kind: "skip",
      reason: "private_address",
      detail: "loopback host",
    });
    expect(resolve(link("http://localhost:3000/"), none, defaults)).toMatchObject({
      kind: "web",
    });
  });

  it("excludes mail and disabled schemes", () => {
    expect(
      resolve(link("mailto:a@example.com"), none, normalizeOptions({ excludeMail: true }))
    ).toMatchObject({ kind: "skip", reason: "mail_excluded" });

    expect(
      resolve(link("http://example.com/"), none, normalizeOptions({ schemes: ["https"] }))
    ).toMatchObject({ kind: "skip", reason: "unsupported_scheme" });
  });
});

describe("targetKey", () => {
  it("formats each target kind", () => {
    const raw = link("x");
    expect(targetKey({ kind: "web", url: "https://example.com/", link: raw })).toBe("https://example.com/");
    expect(targetKey({ kind: "file", path: "/a.md", anchor: "b", link: raw })).toBe("/a.md#b");
    expect(targetKey({ kind: "mail", address: "a@example.com", link: raw })).toBe("mailto:a@example.com");
  });
});
