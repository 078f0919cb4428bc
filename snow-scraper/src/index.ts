import "dotenv/config";
import { createClient } from "@supabase/supabase-js";
import { createOpenAiClient } from "./completion";
import { loadConfig } from "./config";
import { openPlaywrightFetcher } from "./fetch";
import { log } from "./logger";
import { saveRunReport } from "./report";
import { loadUrls, runPipeline } from "./run";
import { createSupabaseStore } from "./store";
import { errorMessage } from "./utils";

async function main() {
  const config = loadConfig();

  const supabase = createClient(config.supabase.url, config.supabase.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  const completion = createOpenAiClient(config.openai);
  const store = createSupabaseStore(supabase, config.supabase.table);

  const urls = await loadUrls(config.urlsFile);
  log.info(`Loaded ${urls.length} URLs from ${config.urlsFile}`);

  const summary = await runPipeline(
    urls,
    {
      openFetcher: () => openPlaywrightFetcher(config.browser),
      completion,
      store,
    },
    {
      batchSize: config.batchSize,
      batchDelayMs: config.batchDelayMs,
      extractBatchSize: config.extractBatchSize,
      extractDelayMs: config.extractDelayMs,
      reportSelector: config.reportSelector,
    }
  );

  const failed = summary.outcomes.filter((o) => !o.ok).length;
  log.info(
    `\nDone: ${summary.totalUrls} URLs in ${summary.totalBatches} batches, ${summary.saved} saved, ` +
      `${failed} failed, ${summary.saveFailures.length} save errors`
  );

  if (config.reportDir) {
    const path = await saveRunReport(summary, config.reportDir);
    log.detail(`Run report: ${path}`);
  }
}

main().catch((e: unknown) => {
  log.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
