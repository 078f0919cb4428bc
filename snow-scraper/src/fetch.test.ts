import { describe, it, expect, vi, beforeEach } from "vitest";
import { chromium } from "playwright-core";
import { openPlaywrightFetcher, DEFAULT_USER_AGENT } from "./fetch";

vi.mock("playwright-core", () => ({
  chromium: { launch: vi.fn() },
}));

type FakePage = { status?: number; html?: string; error?: string };

function fakeBrowser(pages: Record<string, FakePage>) {
  const pageClose = vi.fn(async () => undefined);
  const context = {
    newPage: vi.fn(async () => {
      let current = "";
      return {
        goto: vi.fn(async (url: string) => {
          current = url;
          const page = pages[url];
          if (page?.error) throw new Error(page.error);
          const status = page?.status ?? 200;
          return { ok: () => status >= 200 && status < 300, status: () => status };
        }),
        content: vi.fn(async () => pages[current]?.html ?? ""),
        close: pageClose,
      };
    }),
    close: vi.fn(async () => undefined),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => undefined),
  };
  return { browser, context, pageClose };
}

const options = { headless: true, timeoutMs: 5000, userAgent: DEFAULT_USER_AGENT };

describe("openPlaywrightFetcher", () => {
  beforeEach(() => {
    vi.mocked(chromium.launch).mockReset();
  });

  it("returns the rendered markup and closes the page", async () => {
    const { browser, pageClose } = fakeBrowser({ "https://a.test/": { html: "<p>A</p>" } });
    vi.mocked(chromium.launch).mockResolvedValue(browser as never);

    const fetcher = await openPlaywrightFetcher(options);
    const result = await fetcher.fetch("https://a.test/");

    expect(result).toEqual({ success: true, url: "https://a.test/", html: "<p>A</p>" });
    expect(pageClose).toHaveBeenCalledTimes(1);
    expect(chromium.launch).toHaveBeenCalledWith({ headless: true });
    expect(browser.newContext).toHaveBeenCalledWith({
      userAgent: DEFAULT_USER_AGENT,
      extraHTTPHeaders: { "Cache-Control": "no-cache", Pragma: "no-cache" },
    });
  });

  it("reports a non-2xx response as a failure", async () => {
    const { browser } = fakeBrowser({ "https://a.test/missing": { status: 404 } });
    vi.mocked(chromium.launch).mockResolvedValue(browser as never);

    const fetcher = await openPlaywrightFetcher(options);

    expect(await fetcher.fetch("https://a.test/missing")).toEqual({
      success: false,
      url: "https://a.test/missing",
      errorMessage: "HTTP 404",
    });
  });

  it("captures navigation errors as values", async () => {
    const { browser, pageClose } = fakeBrowser({ "https://a.test/slow": { error: "Timeout 5000ms exceeded." } });
    vi.mocked(chromium.launch).mockResolvedValue(browser as never);

    const fetcher = await openPlaywrightFetcher(options);

    expect(await fetcher.fetch("https://a.test/slow")).toEqual({
      success: false,
      url: "https://a.test/slow",
      errorMessage: "Timeout 5000ms exceeded.",
    });
    expect(pageClose).toHaveBeenCalledTimes(1);
  });

  it("closes the context and the browser", async () => {
    const { browser, context } = fakeBrowser({});
    vi.mocked(chromium.launch).mockResolvedValue(browser as never);

    const fetcher = await openPlaywrightFetcher(options);
    await fetcher.close();

    expect(context.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("closes the browser when the context cannot be created", async () => {
    const { browser } = fakeBrowser({});
    browser.newContext.mockRejectedValueOnce(new Error("context refused"));
    vi.mocked(chromium.launch).mockResolvedValue(browser as never);

    await expect(openPlaywrightFetcher(options)).rejects.toThrow("context refused");
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
