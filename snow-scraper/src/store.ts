import type { SupabaseClient } from "@supabase/supabase-js";
import { log, type Logger } from "./logger";
import { RESORT_FIELD, type SnowReport } from "./schema";
import type { ItemOutcome, SaveSummary } from "./types";
import { errorMessage } from "./utils";

export const DEFAULT_TABLE = "onthesnow";

export interface ReportStore {
  deleteByResort(resort: string): Promise<void>;
  insert(report: SnowReport): Promise<void>;
}

export function createSupabaseStore(client: SupabaseClient, table: string = DEFAULT_TABLE): ReportStore {
  return {
    async deleteByResort(resort) {
      const { error } = await client.from(table).delete().eq(RESORT_FIELD, resort);
      if (error) throw new Error(`delete from ${table} failed: ${error.message}`);
    },
    async insert(report) {
      const { error } = await client.from(table).insert(report);
      if (error) throw new Error(`insert into ${table} failed: ${error.message}`);
    },
  };
}

/**
 * Replaces each resort's row: delete by name, then insert. The two calls are not
 * atomic, so a crash in between leaves the resort without a row until the next run.
 * Resorts are keyed by display name; two resorts sharing a name overwrite each other.
 */
export async function saveOutcomes(outcomes: ItemOutcome[], store: ReportStore, logger: Logger = log): Promise<SaveSummary> {
  const summary: SaveSummary = { saved: 0, skipped: 0, failures: [] };

  for (const outcome of outcomes) {
    const resort = outcome.ok ? outcome.report[RESORT_FIELD] : null;
    if (!outcome.ok || !resort) {
      summary.skipped++;
      continue;
    }

    try {
      await store.deleteByResort(resort);
      await store.insert(outcome.report);
      summary.saved++;
      logger.success(`Successfully saved data for ${resort}`);
    } catch (err) {
      const message = errorMessage(err);
      summary.failures.push({ url: outcome.url, resort, message });
      logger.error(`Error saving ${resort} (${outcome.url}): ${message}`);
      logger.detail(`Data being saved: ${JSON.stringify(outcome.report)}`);
    }
  }

  return summary;
}
