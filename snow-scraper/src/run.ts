import { readFile } from "node:fs/promises";
import { runBatch, type BatchDeps, type BatchOptions } from "./batch";
import { log } from "./logger";
import { saveOutcomes, type ReportStore } from "./store";
import type { ItemOutcome, PersistenceFailure, RunSummary } from "./types";
import { chunk, nowIso, sleep } from "./utils";

export type { RunSummary, ItemOutcome } from "./types";
export type { ReportStore } from "./store";

export type PipelineDeps = BatchDeps & { store: ReportStore };

export type PipelineOptions = BatchOptions & {
  batchSize: number;
  batchDelayMs: number;
};

export async function loadUrls(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Runs batches strictly one after another; a batch's rows are saved before the
 * next batch starts fetching.
 */
export async function runPipeline(urls: string[], deps: PipelineDeps, options: PipelineOptions): Promise<RunSummary> {
  const logger = deps.logger ?? log;
  const pause = deps.sleep ?? sleep;
  const startedAt = nowIso();

  const batches = chunk(urls, options.batchSize);
  const outcomes: ItemOutcome[] = [];
  const saveFailures: PersistenceFailure[] = [];
  let saved = 0;
  let skipped = 0;

  for (const [i, batch] of batches.entries()) {
    logger.info(`\nProcessing batch ${i + 1} of ${batches.length}`);

    const batchOutcomes = await runBatch(batch, deps, options);
    const summary = await saveOutcomes(batchOutcomes, deps.store, logger);

    outcomes.push(...batchOutcomes);
    saveFailures.push(...summary.failures);
    saved += summary.saved;
    skipped += summary.skipped;
    logger.info(`Completed batch ${i + 1}`);

    if (i < batches.length - 1) {
      await pause(options.batchDelayMs);
    }
  }

  return {
    totalUrls: urls.length,
    totalBatches: batches.length,
    outcomes,
    saved,
    skipped,
    saveFailures,
    startedAt,
    finishedAt: nowIso(),
  };
}
