/**
 * HTTP Extractor
 * Fetches a page with bounded redirects and size, then reduces it to text
 */

import * as cheerio from "cheerio";
import { FetchError, errorMessage, isEquisightError } from "@equisight/core";
import type { ExtractOptions, ExtractedDocument, IDocumentExtractor } from "./types.js";

const MAX_BYTES = 2_000_000; // 2MB
const MAX_REDIRECTS = 5;

const BOILERPLATE =
  "script, style, noscript, nav, footer, header, aside, .sidebar, .menu, .nav, .advertisement, .ad";

const CONTENT_SELECTORS = [
  "article",
  "main",
  "[role='main']",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content",
  ".post",
  ".article",
];

const BLOCKS = "p, div, li, br, h1, h2, h3, h4, h5, h6, tr, td, th, section, blockquote";

function validateUrlForFetch(url: URL): void {
  if (!["http:", "https:"].includes(url.protocol)) {
    throw new FetchError("Only http/https URLs are allowed", url.toString());
  }
  if (url.username || url.password) {
    throw new FetchError("URLs with embedded credentials are not allowed", url.toString());
  }
}

/**
 * Reduce an HTML document to the text of its main content, falling back to the body
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);

  $(BOILERPLATE).remove();
  // Keep words in adjacent blocks apart
  $(BLOCKS).after(" ");

  let content = "";
  for (const selector of CONTENT_SELECTORS) {
    const el = $(selector);
    if (el.length > 0) {
      content = el.text();
      break;
    }
  }

  if (!content) {
    content = $("body").text();
  }

  return content.replace(/\s+/g, " ").trim();
}

async function readBounded(res: Response, url: string): Promise<string> {
  const reader = res.body?.getReader();
  if (!reader) throw new FetchError("No response body", url);

  let total = 0;
  const chunks: Uint8Array[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (value) {
      total += value.length;
      if (total > MAX_BYTES) {
        await reader.cancel();
        throw new FetchError("Response too large", url);
      }
      chunks.push(value);
    }
  }

  return Buffer.concat(chunks).toString("utf-8");
}

export class HttpExtractor implements IDocumentExtractor {
  async extract(urlStr: string, options: ExtractOptions): Promise<ExtractedDocument> {
    let url: URL;
    try {
      url = new URL(urlStr);
    } catch (error) {
      throw new FetchError("Invalid URL", urlStr, { cause: error });
    }

    const signal = AbortSignal.timeout(options.timeoutMs);

    try {
      const { res, finalUrl } = await this.fetchWithRedirects(url, options.userAgent, signal);
      if (!res.ok) {
        throw new FetchError(`Fetch failed: ${res.status}`, urlStr, { status: res.status });
      }

      const contentType = (res.headers.get("content-type") ?? "").toLowerCase();
      const isHtml = contentType.includes("text/html") || contentType.includes("xhtml");
      const isText = contentType === "" || contentType.startsWith("text/") || contentType.includes("json") || contentType.includes("xml");

      if (!isHtml && !isText) {
        throw new FetchError(`Unsupported content type: ${contentType}`, urlStr);
      }

      const raw = await readBounded(res, urlStr);

      return {
        url: urlStr,
        finalUrl: finalUrl.toString(),
        contentType,
        text: isHtml ? htmlToText(raw) : raw.trim(),
      };
    } catch (error) {
      if (isEquisightError(error)) throw error;
      throw new FetchError(`Fetch failed: ${errorMessage(error)}`, urlStr, { cause: error });
    }
  }

  private async fetchWithRedirects(
    initialUrl: URL,
    userAgent: string,
    signal: AbortSignal
  ): Promise<{ res: Response; finalUrl: URL }> {
    let current = initialUrl;

    for (let i = 0; i <= MAX_REDIRECTS; i++) {
      validateUrlForFetch(current);

      const res = await fetch(current.toString(), {
        redirect: "manual",
        signal,
        headers: {
          "User-Agent": userAgent,
          Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
        },
      });

      if (res.status >= 300 && res.status < 400) {
        const location = res.headers.get("location");
        if (!location) throw new FetchError("Redirect without location header", current.toString());

        current = new URL(location, current);
        continue;
      }

      return { res, finalUrl: current };
    }

    throw new FetchError("Too many redirects", initialUrl.toString());
  }
}

/**
 * Create the default extractor
 */
export function createHttpExtractor(): IDocumentExtractor {
  return new HttpExtractor();
}
