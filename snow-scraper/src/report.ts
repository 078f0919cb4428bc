import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { RunSummary } from "./types";

export function reportFilename(startedAt: string): string {
  return `${startedAt.replace(/:/g, "-").replace(/\.\d+Z$/, "Z")} snow-report.json`;
}

export async function saveRunReport(summary: RunSummary, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, reportFilename(summary.startedAt));

  const failed = summary.outcomes.flatMap((o) => (o.ok ? [] : [o.failure]));
  const report = {
    startedAt: summary.startedAt,
    finishedAt: summary.finishedAt,
    totalUrls: summary.totalUrls,
    totalBatches: summary.totalBatches,
    extracted: summary.outcomes.length - failed.length,
    saved: summary.saved,
    skipped: summary.skipped,
    failures: failed,
    saveFailures: summary.saveFailures,
    reports: summary.outcomes.flatMap((o) => (o.ok ? [{ url: o.url, ...o.report }] : [])),
  };

  await writeFile(path, JSON.stringify(report, null, 2), "utf-8");
  return path;
}
