import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchHtml } from "../src/lib/fetcher";

afterEach(() => {
  vi.unstubAllGlobals();
});

const respondWith = (response: Response) => {
  vi.stubGlobal("fetch", vi.fn(async () => response));
};

describe("fetchHtml", () => {
  it("returns the body of an HTML page", async () => {
    respondWith(new Response("<p>ok</p>", { status: 200, headers: { "content-type": "text/html; charset=utf-8" } }));
    expect(await fetchHtml("https://a.com/x")).toBe("<p>ok</p>");
  });

  it("returns null for other content types", async () => {
    respondWith(new Response("%PDF", { status: 200, headers: { "content-type": "application/pdf" } }));
    expect(await fetchHtml("https://a.com/x.pdf")).toBeNull();
  });

  it("returns null for non-200 statuses", async () => {
    respondWith(new Response("gone", { status: 404, headers: { "content-type": "text/html" } }));
    expect(await fetchHtml("https://a.com/missing")).toBeNull();
  });

  it("returns null when the request fails", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    expect(await fetchHtml("https://a.com/down")).toBeNull();
  });
});
