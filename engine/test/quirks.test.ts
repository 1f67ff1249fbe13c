import { describe, expect, it } from "vitest";
import { applyQuirks } from "../src/lib/quirks.js";

describe("quirks", () => {
  it("checks youtube videos through their thumbnail", () => {
    const out = applyQuirks({ url: "https://www.youtube.com/watch?v=abc123", headers: {} });
    expect(out.url).toBe("https://img.youtube.com/vi/abc123/0.jpg");
  });

  it("asks crates.io for html", () => {
    const out = applyQuirks({
      url: "https://crates.io/crates/serde",
      headers: { Accept: "*/*", "User-Agent": "test" },
    });
    expect(out).toEqual({
      url: "https://crates.io/crates/serde",
      headers: { Accept: "text/html", "User-Agent": "test" },
    });
  });

  it("leaves other requests alone", () => {
    const request = { url: "https://example.com/watch?v=abc", headers: {} };
    expect(applyQuirks(request)).toBe(request);

    const invalid = { url: "not a url", headers: {} };
    expect(applyQuirks(invalid)).toBe(invalid);
  });
});
