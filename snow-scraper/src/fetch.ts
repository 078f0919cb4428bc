import { chromium, type Page } from "playwright-core";
import type { FetchResult } from "./types";
import { errorMessage } from "./utils";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
  close(): Promise<void>;
}

export type FetcherOptions = {
  headless: boolean;
  timeoutMs: number;
  userAgent: string;
};

/**
 * Launches one Chromium instance. The caller owns it and must call `close()`.
 * A fresh context per launch plus no-cache headers means every run sees live pages.
 */
export async function openPlaywrightFetcher(options: FetcherOptions): Promise<PageFetcher> {
  const browser = await chromium.launch({ headless: options.headless });
  const ctx = await browser
    .newContext({
      userAgent: options.userAgent,
      extraHTTPHeaders: { "Cache-Control": "no-cache", Pragma: "no-cache" },
    })
    .catch(async (err: unknown) => {
      await browser.close();
      throw err;
    });

  return {
    async fetch(url: string): Promise<FetchResult> {
      let page: Page | undefined;
      try {
        page = await ctx.newPage();
        const response = await page.goto(url, { waitUntil: "domcontentloaded", timeout: options.timeoutMs });
        if (response && !response.ok()) {
          return { success: false, url, errorMessage: `HTTP ${response.status()}` };
        }
        const html = await page.content();
        return { success: true, url, html };
      } catch (err) {
        return { success: false, url, errorMessage: errorMessage(err) };
      } finally {
        await page?.close().catch(() => undefined);
      }
    },

    async close(): Promise<void> {
      try {
        await ctx.close();
      } finally {
        await browser.close();
      }
    },
  };
}
