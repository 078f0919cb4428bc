import pLimit from "p-limit";
import type { CompletionClient } from "./completion";
import { extractSubBatch } from "./extract";
import type { PageFetcher } from "./fetch";
import { log, type Logger } from "./logger";
import type { FetchedPage, FetchResult, ItemOutcome } from "./types";
import { chunk, errorMessage, sleep } from "./utils";

export type BatchDeps = {
  openFetcher: () => Promise<PageFetcher>;
  completion: CompletionClient;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export type BatchOptions = {
  extractBatchSize: number;
  extractDelayMs: number;
  reportSelector?: string;
};

async function fetchAll(urls: string[], deps: BatchDeps): Promise<FetchResult[]> {
  const logger = deps.logger ?? log;

  let fetcher: PageFetcher;
  try {
    fetcher = await deps.openFetcher();
  } catch (err) {
    const message = `browser launch failed: ${errorMessage(err)}`;
    logger.error(message);
    return urls.map((url) => ({ success: false, url, errorMessage: message }));
  }

  try {
    const limit = pLimit(Math.max(urls.length, 1));
    const settled = await Promise.allSettled(urls.map((url) => limit(() => fetcher.fetch(url))));
    return settled.map((res, i): FetchResult =>
      res.status === "fulfilled" ? res.value : { success: false, url: urls[i], errorMessage: errorMessage(res.reason) }
    );
  } finally {
    await fetcher.close().catch((err: unknown) => logger.warn(`Failed to close browser: ${errorMessage(err)}`));
  }
}

/**
 * Fetches a batch with one browser, then extracts the pages that loaded in
 * paced sub-batches. Every input URL comes back exactly once: extraction
 * outcomes first, fetch failures after.
 */
export async function runBatch(urls: string[], deps: BatchDeps, options: BatchOptions): Promise<ItemOutcome[]> {
  const logger = deps.logger ?? log;
  const pause = deps.sleep ?? sleep;

  const fetched = await fetchAll(urls, deps);

  const pages: FetchedPage[] = [];
  const failed: ItemOutcome[] = [];
  for (const result of fetched) {
    if (result.success) {
      pages.push({ url: result.url, html: result.html });
      logger.success(`Successfully crawled ${result.url}`);
    } else {
      failed.push({
        ok: false,
        url: result.url,
        failure: { kind: "fetch", url: result.url, message: result.errorMessage },
      });
      logger.warn(`Failed to crawl ${result.url}: ${result.errorMessage}`);
    }
  }

  const outcomes: ItemOutcome[] = [];
  const subBatches = chunk(pages, options.extractBatchSize);
  for (const [i, subBatch] of subBatches.entries()) {
    const extracted = await extractSubBatch(subBatch, deps.completion, { reportSelector: options.reportSelector });
    for (const outcome of extracted) {
      if (!outcome.ok) logger.warn(`Extraction failed for ${outcome.url}: ${outcome.failure.message}`);
    }
    outcomes.push(...extracted);

    if (i < subBatches.length - 1) {
      await pause(options.extractDelayMs);
    }
  }

  return outcomes.concat(failed);
}
