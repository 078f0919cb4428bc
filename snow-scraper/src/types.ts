import type { SnowReport } from "./schema";

export type { SnowReport } from "./schema";

export type FetchResult =
  | { success: true; url: string; html: string }
  | { success: false; url: string; errorMessage: string };

export type FailureKind = "fetch" | "extraction-parse" | "extraction-dispatch";

export type ItemFailure = {
  kind: FailureKind;
  url: string;
  message: string;
};

export type ItemOutcome =
  | { ok: true; url: string; report: SnowReport }
  | { ok: false; url: string; failure: ItemFailure };

export type FetchedPage = { url: string; html: string };

export type PersistenceFailure = {
  url: string;
  resort: string;
  message: string;
};

export type SaveSummary = {
  saved: number;
  skipped: number;
  failures: PersistenceFailure[];
};

export type RunSummary = {
  totalUrls: number;
  totalBatches: number;
  outcomes: ItemOutcome[];
  saved: number;
  skipped: number;
  saveFailures: PersistenceFailure[];
  startedAt: string; // ISO
  finishedAt: string; // ISO
};
