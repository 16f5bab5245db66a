/**
 * Document Fetcher
 * Loads each URL independently; failures and thin pages are skipped
 */

import { errorMessage } from "@equisight/core";
import type { IDocumentExtractor } from "../../../shared/fetcher/types.js";
import type { IActivityChannel } from "../../../shared/observability/types.js";
import { sleep } from "../../../shared/utils/sleep.js";
import type { FetchedDocument } from "../types.js";

const STAGE = "fetcher";

export interface FetcherDependencies {
  extractor: IDocumentExtractor;
}

export interface FetcherOptions {
  timeoutMs: number;
  userAgent: string;
  fetchDelayMs: number;
  minContentLength: number;
}

export async function loadDocuments(
  urls: readonly string[],
  deps: FetcherDependencies,
  options: FetcherOptions,
  channel: IActivityChannel
): Promise<FetchedDocument[]> {
  channel.emit(STAGE, "info", "Loading documents", `${urls.length} URL(s)`);

  const documents: FetchedDocument[] = [];

  for (const [i, url] of urls.entries()) {
    if (i > 0) {
      await sleep(options.fetchDelayMs);
    }

    try {
      const extracted = await deps.extractor.extract(url, {
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
      });

      const content = extracted.text;
      // Characters, not UTF-16 code units
      const contentLength = [...content].length;
      if (contentLength < options.minContentLength) {
        channel.emit(
          STAGE,
          "warning",
          "Skipped thin document",
          `${url} (${contentLength} chars)`
        );
        continue;
      }

      documents.push({ source: url, content, contentLength });
      channel.emit(STAGE, "success", "Loaded document", `${url} (${contentLength} chars)`);
    } catch (error) {
      channel.emit(STAGE, "warning", "Failed to load URL", `${url}: ${errorMessage(error).slice(0, 100)}`);
    }
  }

  channel.emit(
    STAGE,
    documents.length > 0 ? "success" : "warning",
    `Loaded ${documents.length} of ${urls.length} document(s)`
  );
  channel.metric("fetcher.documents", documents.length);

  return documents;
}
