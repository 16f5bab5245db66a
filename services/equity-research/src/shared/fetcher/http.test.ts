import { describe, it, expect, vi } from "vitest";
import { FetchError } from "@equisight/core";
import { HttpExtractor, htmlToText } from "./http.js";

const options = { timeoutMs: 5000, userAgent: "test-agent" };

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

describe("htmlToText", () => {
  it("should drop scripts, styles and comments and decode entities", () => {
    const html =
      "<html><head><style>p { color: red }</style><script>var x = 1;</script></head>" +
      "<body><h1>Tesla &amp; Co</h1><!-- hidden --><p>Revenue&nbsp;rose &#36;5</p></body></html>";

    expect(htmlToText(html)).toBe("Tesla & Co Revenue rose $5");
  });

  it("should keep only the article when the page has one", () => {
    const html =
      "<body><header>Markets</header><nav><a href=\"/earnings\">Earnings</a></nav>" +
      "<article><p>Owners met downtown to compare charging habits.</p>" +
      "<img alt=\"chart > trend\" src=\"x.png\"><p>It was &#x27;fun&#x27;.</p></article>" +
      "<footer>Quarterly newsletter signup</footer></body>";

    expect(htmlToText(html)).toBe("Owners met downtown to compare charging habits. It was 'fun'.");
  });

  it("should drop navigation when falling back to the body", () => {
    const html = "<body><nav><a href=\"/earnings\">Earnings</a></nav><div>Deliveries rose.</div></body>";

    expect(htmlToText(html)).toBe("Deliveries rose.");
  });
});

describe("HttpExtractor", () => {
  it("should extract text from an HTML page", async () => {
    const fetchMock = vi.fn().mockResolvedValue(htmlResponse("<p>Hello <b>world</b></p>"));
    vi.stubGlobal("fetch", fetchMock);

    const doc = await new HttpExtractor().extract("https://example.com/a", options);

    expect(doc).toEqual({
      url: "https://example.com/a",
      finalUrl: "https://example.com/a",
      contentType: "text/html; charset=utf-8",
      text: "Hello world",
    });
    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(init.redirect).toBe("manual");
    expect(init.headers["User-Agent"]).toBe("test-agent");
  });

  it("should follow relative redirects", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValueOnce(new Response(null, { status: 301, headers: { location: "/b" } }))
        .mockResolvedValueOnce(
          new Response("  plain text  ", { status: 200, headers: { "content-type": "text/plain" } })
        )
    );

    const doc = await new HttpExtractor().extract("https://example.com/a", options);

    expect(doc.finalUrl).toBe("https://example.com/b");
    expect(doc.text).toBe("plain text");
  });

  it("should fail on HTTP errors with the status", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(htmlResponse("missing", 404)));

    try {
      await new HttpExtractor().extract("https://example.com/missing", options);
      expect.unreachable("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(FetchError);
      const e = err as FetchError;
      expect(e.message).toBe("Fetch failed: 404");
      expect(e.status).toBe(404);
      expect(e.url).toBe("https://example.com/missing");
    }
  });

  it("should reject binary content", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response("%PDF", { status: 200, headers: { "content-type": "application/pdf" } })
      )
    );

    await expect(new HttpExtractor().extract("https://example.com/file.pdf", options)).rejects.toThrow(
      "Unsupported content type: application/pdf"
    );
  });

  it("should reject invalid and non-http URLs before fetching", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const extractor = new HttpExtractor();

    await expect(extractor.extract("not a url", options)).rejects.toThrow("Invalid URL");
    await expect(extractor.extract("ftp://example.com/file", options)).rejects.toThrow(
      "Only http/https URLs are allowed"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should wrap network failures in FetchError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("ECONNRESET")));

    await expect(new HttpExtractor().extract("https://example.com", options)).rejects.toThrow(
      new FetchError("Fetch failed: ECONNRESET", "https://example.com")
    );
  });
});
